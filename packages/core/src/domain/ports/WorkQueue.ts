import type { ShardMessage } from '../model/PredictionRequest.js';

/** Port for the work queue. Delivery to workers is at-least-once. */
export interface WorkQueue {
  publish(message: ShardMessage): Promise<void>;
}
