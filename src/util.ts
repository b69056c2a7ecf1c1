import PriorityQueue from "priorityqueuejs";

export { bumpLogging, log, logger, setLogger, wouldLog } from "./logger";

export function pushUnique<T, U extends T>(arr: T[], value: U) {
  if (arr.find((v) => v === value) != null) return false;
  arr.push(value);
  return true;
}

export function sameSets<T>(a: ReadonlySet<T>, b: ReadonlySet<T>) {
  if (a.size !== b.size) return false;
  for (const v of a) {
    if (!b.has(v)) return false;
  }
  return true;
}

export function isSubset<T>(a: ReadonlySet<T>, b: ReadonlySet<T>) {
  if (a.size > b.size) return false;
  for (const v of a) {
    if (!b.has(v)) return false;
  }
  return true;
}

export class GenericQueue<Block> {
  private enqueued = new Set<Block>();
  private queue;
  constructor(sort: (a: Block, b: Block) => number) {
    this.queue = new PriorityQueue<Block>(sort);
  }
  enqueue(block: Block) {
    if (!this.enqueued.has(block)) {
      this.enqueued.add(block);
      this.queue.enq(block);
    }
  }
  dequeue() {
    const block = this.queue.deq();
    this.enqueued.delete(block);
    return block;
  }
  empty() {
    return this.queue.isEmpty();
  }
}
