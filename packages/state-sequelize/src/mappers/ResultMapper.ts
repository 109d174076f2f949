import type { BusinessKey, GradeRecord, PredictionResult, ToleranceCheck } from '@predgrid/core';
import { Recommendation, lineKey } from '@predgrid/core';
import type { ResultRow } from '../models/resultColumns.js';
import type { GradeRow } from '../models/GradeModel.js';
import { parseJson } from '../utils/parseJson.js';
import { isRecord, parseEnum, toEpoch } from '../utils/columns.js';

const RECOMMENDATIONS = Object.values(Recommendation);

/** Primary key columns of a business key. */
export interface KeyColumns {
  entityId: string;
  eventId: string;
  strategyId: string;
  lineKey: string;
}

export function toKeyColumns(key: BusinessKey): KeyColumns {
  return {
    entityId: key.entityId,
    eventId: key.eventId,
    strategyId: key.strategyId,
    lineKey: lineKey(key.quotedLine),
  };
}

/** The serialized business key of a stored row, matching `businessKeyOf`. */
export function storedKeyOf(row: KeyColumns): string {
  return [row.entityId, row.eventId, row.strategyId, row.lineKey].join('|');
}

export function toResultRow(result: PredictionResult): ResultRow {
  return {
    ...toKeyColumns(result),
    quotedLine: result.quotedLine,
    targetDate: result.targetDate,
    batchId: result.batchId,
    value: result.value,
    confidence: result.confidence,
    recommendation: result.recommendation,
    lineSource: result.lineSource,
    strategyVersion: result.strategyVersion,
    computedAt: result.computedAt,
    voided: result.voided ?? false,
    voidReason: result.voidReason ?? null,
  };
}

export function toPredictionResult(row: ResultRow): PredictionResult {
  const result: PredictionResult = {
    entityId: row.entityId,
    eventId: row.eventId,
    strategyId: row.strategyId,
    quotedLine: row.quotedLine === null ? null : Number(row.quotedLine),
    targetDate: row.targetDate,
    batchId: row.batchId,
    value: Number(row.value),
    confidence: Number(row.confidence),
    recommendation: parseEnum(RECOMMENDATIONS, row.recommendation, 'recommendation'),
    lineSource: row.lineSource,
    strategyVersion: row.strategyVersion,
    computedAt: toEpoch(row.computedAt),
  };
  // SQLite hands booleans back as 0/1
  if (!row.voided) return result;
  return { ...result, voided: true, voidReason: row.voidReason ?? undefined };
}

export function toGradeRow(grade: GradeRecord): GradeRow {
  return {
    ...toKeyColumns(grade),
    quotedLine: grade.quotedLine,
    gradingRunId: grade.gradingRunId,
    targetDate: grade.targetDate,
    recommendation: grade.recommendation,
    predictedValue: grade.predictedValue,
    actualValue: grade.actualValue,
    absoluteError: grade.absoluteError,
    signedError: grade.signedError,
    withinTolerance: grade.withinTolerance,
    predictedMargin: grade.predictedMargin,
    actualMargin: grade.actualMargin,
    correct: grade.correct,
    confidenceDecile: grade.confidenceDecile,
    gradedAt: grade.gradedAt,
  };
}

function toToleranceCheck(value: unknown): ToleranceCheck {
  if (!isRecord(value)) {
    throw new Error('Malformed tolerance check in database');
  }
  const { band, within } = value;
  if (typeof band !== 'number') {
    throw new Error('Malformed tolerance check in database');
  }
  return { band, within: Boolean(within) };
}

const nullableNumber = (value: number | null): number | null => (value === null ? null : Number(value));

export function toGradeRecord(row: GradeRow): GradeRecord {
  const tolerance = parseJson(row.withinTolerance, 'withinTolerance');
  if (!Array.isArray(tolerance)) {
    throw new Error(`Grade of ${row.entityId} has no tolerance list`);
  }
  return {
    entityId: row.entityId,
    eventId: row.eventId,
    strategyId: row.strategyId,
    quotedLine: nullableNumber(row.quotedLine),
    gradingRunId: row.gradingRunId,
    targetDate: row.targetDate,
    recommendation: parseEnum(RECOMMENDATIONS, row.recommendation, 'recommendation'),
    predictedValue: Number(row.predictedValue),
    actualValue: Number(row.actualValue),
    absoluteError: Number(row.absoluteError),
    signedError: Number(row.signedError),
    withinTolerance: tolerance.map(toToleranceCheck),
    predictedMargin: nullableNumber(row.predictedMargin),
    actualMargin: nullableNumber(row.actualMargin),
    correct: row.correct === null ? null : Boolean(row.correct),
    confidenceDecile: nullableNumber(row.confidenceDecile),
    gradedAt: toEpoch(row.gradedAt),
  };
}
