/**
 * EventTimeline: min-heap of pending completion events keyed by finish time.
 *
 * Ties are broken by insertion order so draining is reproducible.
 * At most one live event per task id.
 */

export interface TimelineEvent {
  finishTime: number;
  taskId: string;
}

interface HeapEntry extends TimelineEvent {
  seq: number;
}

export class EventTimeline {
  private heap: HeapEntry[] = [];
  private live: Set<string> = new Set();
  private seq = 0;

  push(finishTime: number, taskId: string): void {
    if (this.live.has(taskId)) {
      throw new Error(`Task "${taskId}" already has a pending completion event`);
    }
    this.live.add(taskId);
    this.heap.push({ finishTime, taskId, seq: this.seq++ });
    this.siftUp(this.heap.length - 1);
  }

  peekMin(): TimelineEvent | undefined {
    const top = this.heap[0];
    return top ? { finishTime: top.finishTime, taskId: top.taskId } : undefined;
  }

  /**
   * Pop every event with finishTime <= now, earliest first.
   */
  popDue(now: number): TimelineEvent[] {
    const due: TimelineEvent[] = [];
    let top = this.heap[0];
    while (top !== undefined && top.finishTime <= now) {
      this.popMin();
      due.push({ finishTime: top.finishTime, taskId: top.taskId });
      top = this.heap[0];
    }
    return due;
  }

  has(taskId: string): boolean {
    return this.live.has(taskId);
  }

  get size(): number {
    return this.heap.length;
  }

  private popMin(): void {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return;
    this.live.delete(top.taskId);
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
  }

  private less(a: HeapEntry, b: HeapEntry): boolean {
    return a.finishTime < b.finishTime || (a.finishTime === b.finishTime && a.seq < b.seq);
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(this.heap[i], this.heap[parent])) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.heap.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.less(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < n && this.less(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}
