/** Grading state of a target date. `pending` dates are not yet safe to use. */
export interface GradingDateState {
  readonly targetDate: string;
  readonly status: 'pending' | 'graded';
  readonly reason?: string;
  readonly gradingRunId: string;
  readonly updatedAt: number;
}
