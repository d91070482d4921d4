import { StopReason } from './types';

// Outcomes of a submitted solution. They replace expired/interrupted so a
// submission still in flight when the run is stopped is reported.
const SUBMISSION_OUTCOMES: ReadonlySet<StopReason> = new Set<StopReason>(['solution_accepted', 'submission_exhausted']);

/**
 * Process-wide cooperative stop flag.
 * Workers poll isSet(); the first set() after a clear() decides the reason,
 * except that the first submission outcome overrides expired/interrupted.
 */
export class StopSignal {
  private reason: StopReason | null = null;

  isSet(): boolean {
    return this.reason !== null;
  }

  getReason(): StopReason | null {
    return this.reason;
  }

  /**
   * Returns true when this call was the one that stopped the run
   */
  set(reason: StopReason): boolean {
    if (this.reason === null) {
      this.reason = reason;
      return true;
    }
    if (SUBMISSION_OUTCOMES.has(reason) && !SUBMISSION_OUTCOMES.has(this.reason)) {
      this.reason = reason;
      return true;
    }
    return false;
  }

  clear(): void {
    this.reason = null;
  }
}
