/**
 * Challenge Runner
 * Drives challenges one at a time: clear stop, reset stats, publish, run, advance.
 * A fresh orchestrator and worker pool is built for every challenge.
 */

import { HashOracleFactory } from '../hash/engine';
import Logger from '../utils/logger';
import { Clock, sleep as defaultSleep, Sleep } from '../utils/sleep';
import { ReceiptsLogger } from '../storage/receipts-logger';
import { MiningOrchestrator, OrchestratorOptions } from './orchestrator';
import { MiningStatsTracker } from './stats';
import { StopSignal } from './stop-signal';
import { SolutionSubmitter } from './submission';
import { Challenge, MiningEventListener, RunOutcome } from './types';

export const CHALLENGE_DELAY_MS = 1000;

export interface ChallengeRunnerOptions {
  address: string;
  workers: number;
  submitOnFind: boolean;
  oracleFactory: HashOracleFactory;
  submitter: SolutionSubmitter;
  receiptsLogger?: ReceiptsLogger;
  statsIntervalMs?: number;
  challengeDelayMs?: number;
  orchestratorTuning?: Pick<OrchestratorOptions, 'pollIntervalMs' | 'workerTuning'>;
  onEvent?: MiningEventListener;
  sleep?: Sleep;
  now?: Clock;
}

export interface ChallengeRunSummary {
  completed: RunOutcome[];
  skipped: string[];
  interrupted: boolean;
}

export class ChallengeRunner {
  readonly stopSignal = new StopSignal();
  readonly stats: MiningStatsTracker;
  private interrupted = false;
  private readonly sleep: Sleep;

  constructor(private readonly options: ChallengeRunnerOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.stats = new MiningStatsTracker(options.now);
  }

  /**
   * Stop the current challenge and start no further ones
   */
  interrupt(): void {
    this.interrupted = true;
    this.stopSignal.set('interrupted');
  }

  isInterrupted(): boolean {
    return this.interrupted;
  }

  async run(challenges: Challenge[]): Promise<ChallengeRunSummary> {
    const { address } = this.options;
    const summary: ChallengeRunSummary = { completed: [], skipped: [], interrupted: false };
    const solved = this.options.receiptsLogger?.loadSolvedChallenges().get(address) ?? new Set<string>();

    Logger.log('runner', `Starting miner for address ${address}`);
    Logger.log('runner', `Processing ${challenges.length} challenges`);

    for (let idx = 0; idx < challenges.length; idx++) {
      if (this.interrupted) break;

      const challenge = challenges[idx];
      const label = `${idx + 1}/${challenges.length}`;

      if (solved.has(challenge.challenge_id)) {
        Logger.log('runner', `Skipping challenge ${label}: ${challenge.challenge_id} (receipt already recorded)`);
        summary.skipped.push(challenge.challenge_id);
        continue;
      }

      Logger.log('runner', `Processing challenge ${label}: ${challenge.challenge_id}`);

      this.stopSignal.clear();
      this.stats.reset();

      const outcome = await this.runOne(challenge);
      summary.completed.push(outcome);
      if (outcome.reason === 'solution_accepted') {
        solved.add(challenge.challenge_id);
      }

      Logger.log('runner', `Finished challenge ${challenge.challenge_id} (${outcome.reason})`);

      if (this.interrupted) break;
      if (idx < challenges.length - 1) {
        await this.sleep(this.options.challengeDelayMs ?? CHALLENGE_DELAY_MS);
      }
    }

    summary.interrupted = this.interrupted;
    if (!this.interrupted) {
      Logger.log('runner', `Completed all ${challenges.length} challenges`);
    }
    return summary;
  }

  private async runOne(challenge: Challenge): Promise<RunOutcome> {
    const orchestrator = new MiningOrchestrator({
      ...this.options.orchestratorTuning,
      address: this.options.address,
      workers: this.options.workers,
      submitOnFind: this.options.submitOnFind,
      oracleFactory: this.options.oracleFactory,
      submitter: this.options.submitter,
      receiptsLogger: this.options.receiptsLogger,
      stopSignal: this.stopSignal,
      stats: this.stats,
      statsIntervalMs: this.options.statsIntervalMs,
      sleep: this.options.sleep,
      now: this.options.now,
    });

    const onEvent = this.options.onEvent;
    if (onEvent) {
      orchestrator.on('event', onEvent);
    }

    orchestrator.setChallenge(challenge);
    try {
      return await orchestrator.run();
    } finally {
      orchestrator.removeAllListeners();
    }
  }
}
