/**
 * Binary min-heap keyed by a numeric priority.
 *
 * Equal priorities pop in insertion order, so searches built on it are
 * deterministic regardless of cost ties.
 */
type Entry<T> = {
    value: T;
    priority: number;
    seq: number;
};

export class MinPriorityQueue<T> {
    private heap: Entry<T>[] = [];
    private nextSeq = 0;

    get size(): number {
        return this.heap.length;
    }

    get isEmpty(): boolean {
        return this.heap.length === 0;
    }

    /**
     * Insert a value with given priority.
     * @param value The stored value
     * @param priority Lower pops first
     */
    insert(value: T, priority: number): void {
        this.heap.push({ value, priority, seq: this.nextSeq++ });
        this.siftUp(this.heap.length - 1);
    }

    /**
     * Remove and return the minimum-priority value.
     * @throws Error if queue is empty
     */
    popMin(): T {
        const top = this.heap[0];
        if (top === undefined) {
            throw new Error("MinPriorityQueue is empty");
        }
        const last = this.heap.pop();
        if (last !== undefined && this.heap.length > 0) {
            this.heap[0] = last;
            this.siftDown(0);
        }
        return top.value;
    }

    peekPriority(): number | undefined {
        return this.heap[0]?.priority;
    }

    clear(): void {
        this.heap = [];
        this.nextSeq = 0;
    }

    private less(i: number, j: number): boolean {
        const a = this.heap[i];
        const b = this.heap[j];
        return a.priority < b.priority || (a.priority === b.priority && a.seq < b.seq);
    }

    private swap(i: number, j: number): void {
        const tmp = this.heap[i];
        this.heap[i] = this.heap[j];
        this.heap[j] = tmp;
    }

    private siftUp(index: number): void {
        let i = index;
        while (i > 0) {
            const parent = (i - 1) >> 1;
            if (!this.less(i, parent)) break;
            this.swap(i, parent);
            i = parent;
        }
    }

    private siftDown(index: number): void {
        let i = index;
        const n = this.heap.length;
        for (;;) {
            const left = 2 * i + 1;
            const right = left + 1;
            let smallest = i;
            if (left < n && this.less(left, smallest)) smallest = left;
            if (right < n && this.less(right, smallest)) smallest = right;
            if (smallest === i) return;
            this.swap(i, smallest);
            i = smallest;
        }
    }
}
