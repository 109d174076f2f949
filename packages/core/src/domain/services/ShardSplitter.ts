/**
 * Domain service that partitions a list of work items into fixed-size shards.
 *
 * Pure logic with no I/O. The final shard may contain fewer
 * items than `shardSize`.
 */
export class ShardSplitter {
  constructor(private readonly shardSize: number) {
    if (!Number.isInteger(shardSize) || shardSize < 1) {
      throw new Error('Shard size must be a positive integer');
    }
  }

  *split<T>(items: readonly T[]): Iterable<{ readonly items: readonly T[]; readonly shardIndex: number }> {
    let shardIndex = 0;
    for (let start = 0; start < items.length; start += this.shardSize) {
      yield { items: items.slice(start, start + this.shardSize), shardIndex };
      shardIndex++;
    }
  }

  /** Number of shards `itemCount` items produce. */
  count(itemCount: number): number {
    return Math.ceil(itemCount / this.shardSize);
  }
}
