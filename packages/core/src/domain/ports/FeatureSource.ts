/** Model inputs of one entity, keyed by feature name. */
export type FeatureVector = Readonly<Record<string, number>>;

/**
 * Read-only feature lookup, batched by shard.
 *
 * One call per shard; implementations must not be driven once per entity.
 * Entities without inputs are simply absent from the returned map.
 */
export interface FeatureSource {
  loadFeatures(targetDate: string, entityIds: readonly string[]): Promise<ReadonlyMap<string, FeatureVector>>;
}
