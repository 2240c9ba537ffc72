/**
 * Debug logging for the grid algorithms.
 *
 * Off unless HEXLATTICE_DEBUG is set or `setHexDebug(true)` is called. Messages
 * may be passed as thunks so search loops never format text nobody reads.
 */
import { DEBUG_DEFAULT } from "./constants.js";

export type LogMessage = string | (() => string);

let debugEnabled = DEBUG_DEFAULT;

export function setHexDebug(enabled: boolean): void {
    debugEnabled = enabled;
}

export function isHexDebugEnabled(): boolean {
    return debugEnabled;
}

function format(scope: string, message: LogMessage): string {
    return `[${scope}] ${typeof message === "function" ? message() : message}`;
}

/** console.log, tagged with the calling algorithm; dropped while debug is off. */
export function hexLog(scope: string, message: LogMessage): void {
    if (debugEnabled) {
        console.log(format(scope, message));
    }
}

export function hexInfo(scope: string, message: LogMessage): void {
    if (debugEnabled) {
        console.info(format(scope, message));
    }
}

/** Always printed. */
export function hexWarn(scope: string, message: LogMessage): void {
    console.warn(format(scope, message));
}
