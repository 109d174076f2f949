import { describe, it, expect } from 'vitest';
import {
  defaultPipelineConfig,
  loadPipelineConfig,
  resolvePipelineConfig,
} from '../../../src/config/PipelineConfig.js';

describe('resolvePipelineConfig', () => {
  it('should return the defaults without overrides', () => {
    const config = resolvePipelineConfig();

    expect(config).toEqual(defaultPipelineConfig);
    expect(config.shardSize).toBe(100);
    expect(config.sentinelValue).toBe(20);
    expect(config.toleranceBands).toEqual([3, 5]);
  });

  it('should merge nested overrides one level deep', () => {
    const config = resolvePipelineConfig({ shardSize: 10, retry: { publishRetries: 0 } });

    expect(config.shardSize).toBe(10);
    expect(config.retry.publishRetries).toBe(0);
    expect(config.retry.stagingWriteRetries).toBe(3);
  });
});

describe('loadPipelineConfig', () => {
  it('should read PREDGRID_* variables', () => {
    const config = loadPipelineConfig({
      PREDGRID_SHARD_SIZE: '50',
      PREDGRID_RETRY_JITTER_RATIO: '0.5',
      PREDGRID_ACCEPTED_LINE_SOURCES: 'ODDS_API, BETTINGPROS',
      PREDGRID_TOLERANCE_BANDS: '2,4',
      PREDGRID_LOG_LEVEL: 'DEBUG',
      PREDGRID_CIRCUIT_FAILURE_THRESHOLD: '3',
    });

    expect(config.shardSize).toBe(50);
    expect(config.retry.jitterRatio).toBe(0.5);
    expect(config.acceptedLineSources).toEqual(['ODDS_API', 'BETTINGPROS']);
    expect(config.toleranceBands).toEqual([2, 4]);
    expect(config.logLevel).toBe('debug');
    expect(config.circuitBreaker.failureThreshold).toBe(3);
    expect(config.circuitBreaker.openDurationMs).toBe(defaultPipelineConfig.circuitBreaker.openDurationMs);
  });

  it('should ignore blank variables', () => {
    expect(loadPipelineConfig({ PREDGRID_SHARD_SIZE: '  ' })).toEqual(defaultPipelineConfig);
  });

  it('should reject malformed values naming the variable', () => {
    expect(() => loadPipelineConfig({ PREDGRID_SHARD_SIZE: '0' })).toThrow('PREDGRID_SHARD_SIZE must be an integer >= 1');
    expect(() => loadPipelineConfig({ PREDGRID_PUBLISH_RETRIES: 'two' })).toThrow('PREDGRID_PUBLISH_RETRIES');
    expect(() => loadPipelineConfig({ PREDGRID_LOG_LEVEL: 'verbose' })).toThrow('PREDGRID_LOG_LEVEL must be one of');
    expect(() => loadPipelineConfig({ PREDGRID_TOLERANCE_BANDS: '3,-1' })).toThrow('PREDGRID_TOLERANCE_BANDS');
  });
});
