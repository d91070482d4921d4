import { Clock } from '../utils/sleep';
import { StatsSnapshot } from './types';

/**
 * Hash and solution counters shared by every worker of a challenge run
 */
export class MiningStatsTracker {
  private hashes = 0;
  private solutions = 0;
  private lastReportAt: number;
  private hashesAtLastReport = 0;

  constructor(private readonly now: Clock = Date.now) {
    this.lastReportAt = now();
  }

  addHashes(n: number): void {
    this.hashes += n;
  }

  incSolutions(): void {
    this.solutions++;
  }

  snapshot(): { hashes: number; solutions: number } {
    return { hashes: this.hashes, solutions: this.solutions };
  }

  /**
   * Throughput since the previous report; moves the report window forward
   */
  report(): StatsSnapshot {
    const current = this.now();
    const elapsedSeconds = Math.max(0.001, (current - this.lastReportAt) / 1000);
    const hashRate = (this.hashes - this.hashesAtLastReport) / elapsedSeconds;

    this.lastReportAt = current;
    this.hashesAtLastReport = this.hashes;

    return {
      hashes: this.hashes,
      solutions: this.solutions,
      hashRate,
      elapsedSeconds,
    };
  }

  reset(): void {
    this.hashes = 0;
    this.solutions = 0;
    this.hashesAtLastReport = 0;
    this.lastReportAt = this.now();
  }
}
