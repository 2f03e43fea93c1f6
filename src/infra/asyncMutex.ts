/** Simple async mutex providing coarse-grained critical sections. */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    const release = this.enqueue();
    try {
      await previous;
      return await operation();
    } finally {
      release();
    }
  }

  private enqueue(): () => void {
    let release: () => void = () => {};
    const wait = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = this.tail.then(() => wait);
    return release;
  }
}

/**
 * Fixed set of mutexes addressed by a hexadecimal key. Operations on keys in
 * different shards proceed concurrently; operations on the same shard queue
 * behind each other. The store uses the first digit of the fingerprint, so
 * every check-and-insert for one fingerprint goes through the same mutex.
 */
export class ShardedMutex {
  private readonly shards: readonly AsyncMutex[];

  constructor(shardCount = 16) {
    const count = Math.max(1, Math.floor(shardCount));
    this.shards = Array.from({ length: count }, () => new AsyncMutex());
  }

  runExclusive<T>(key: string, operation: () => Promise<T> | T): Promise<T> {
    return this.shardFor(key).runExclusive(operation);
  }

  private shardFor(key: string): AsyncMutex {
    const digit = Number.parseInt(key.charAt(0), 16);
    const index = Number.isNaN(digit) ? hashKey(key) : digit;
    return this.shards[index % this.shards.length];
  }
}

function hashKey(key: string): number {
  let hash = 0;
  for (let index = 0; index < key.length; index += 1) {
    hash = (hash * 31 + key.charCodeAt(index)) >>> 0;
  }
  return hash;
}
