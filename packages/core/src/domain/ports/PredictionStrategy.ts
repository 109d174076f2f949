import type { FeatureVector } from './FeatureSource.js';
import type { Recommendation } from '../model/PredictionResult.js';

export interface StrategyContext {
  readonly entityId: string;
  readonly eventId: string;
  readonly quotedLine: number | null;
}

export interface StrategyOutput {
  readonly value: number;
  readonly confidence: number;
  readonly recommendation: Recommendation;
}

/** A pluggable, pure prediction strategy. */
export interface PredictionStrategy {
  readonly id: string;
  readonly version: string;
  predict(features: FeatureVector, context: StrategyContext): StrategyOutput;
}
