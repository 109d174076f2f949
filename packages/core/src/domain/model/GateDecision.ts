/** Machine-readable reasons for rejecting a result at the Validation Gate. */
export type RejectionCode =
  | 'SENTINEL_VALUE'
  | 'SENTINEL_LINE'
  | 'NON_FINITE_VALUE'
  | 'CONFIDENCE_OUT_OF_RANGE'
  | 'MISSING_IDENTIFIER'
  | 'UNACCEPTED_LINE_SOURCE'
  | 'UNKNOWN_RECOMMENDATION';

/** Outcome of passing one result through the Validation Gate. */
export type GateDecision =
  | { readonly ok: true }
  | { readonly ok: false; readonly code: RejectionCode; readonly reason: string };

export function accepted(): GateDecision {
  return { ok: true };
}

export function rejected(code: RejectionCode, reason: string): GateDecision {
  return { ok: false, code, reason };
}
