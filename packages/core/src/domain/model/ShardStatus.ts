/** Possible statuses for a shard of a batch. */
export const ShardStatus = {
  PENDING: 'pending',
  DISPATCHED: 'dispatched',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type ShardStatus = (typeof ShardStatus)[keyof typeof ShardStatus];

/** `true` once a shard will not change without an explicit re-dispatch. */
export function isTerminalShardStatus(status: ShardStatus): boolean {
  return status === ShardStatus.COMPLETED || status === ShardStatus.FAILED;
}
