/**
 * Mining Orchestrator
 * Owns the published challenge, the worker pool and the throughput report loop
 * for one challenge run.
 */

import { EventEmitter } from 'events';
import { HashOracle, HashOracleFactory } from '../hash/engine';
import Logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { Clock, sleep as defaultSleep, Sleep } from '../utils/sleep';
import { ReceiptsLogger } from '../storage/receipts-logger';
import { getDifficultyZeroBits } from './difficulty';
import { MiningStatsTracker } from './stats';
import { StopSignal } from './stop-signal';
import { SolutionSubmitter } from './submission';
import { Challenge, MiningEvent, RunOutcome } from './types';
import { MiningWorker, MiningWorkerOptions, parseDeadline } from './worker';

export const POLL_INTERVAL_MS = 100;
export const DEFAULT_STATS_INTERVAL_MS = 10000;

type WorkerTuning = Pick<
  MiningWorkerOptions,
  'nonceBatch' | 'idleDelayMs' | 'oracleRetryDelayMs' | 'postSolutionDelayMs' | 'nonceSource'
>;

export interface OrchestratorOptions {
  address: string;
  workers: number;
  submitOnFind: boolean;
  oracleFactory: HashOracleFactory;
  submitter: SolutionSubmitter;
  stopSignal: StopSignal;
  stats: MiningStatsTracker;
  receiptsLogger?: ReceiptsLogger;
  statsIntervalMs?: number;
  pollIntervalMs?: number;
  workerTuning?: WorkerTuning;
  sleep?: Sleep;
  now?: Clock;
}

export class MiningOrchestrator extends EventEmitter {
  private currentChallenge: Readonly<Challenge> | null = null;
  private workers: MiningWorker[] = [];
  private oracles: HashOracle[] = [];
  private workerRuns: Promise<void>[] = [];
  private readonly statsIntervalMs: number;
  private readonly pollIntervalMs: number;
  private readonly sleep: Sleep;
  private readonly now: Clock;

  constructor(private readonly options: OrchestratorOptions) {
    super();
    this.statsIntervalMs = options.statsIntervalMs ?? DEFAULT_STATS_INTERVAL_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Publish a challenge. Readers get the frozen snapshot, never a partially updated object.
   */
  setChallenge(challenge: Challenge | null): void {
    this.currentChallenge = challenge ? Object.freeze({ ...challenge }) : null;
  }

  getChallenge = (): Readonly<Challenge> | null => {
    return this.currentChallenge;
  };

  getWorkerCount(): number {
    return this.workers.length;
  }

  startWorkers(): void {
    const { address, workers, submitOnFind, oracleFactory, submitter, stopSignal, stats, receiptsLogger } = this.options;

    for (let id = 0; id < workers; id++) {
      const oracle = oracleFactory(id);
      const worker = new MiningWorker({
        ...this.options.workerTuning,
        id,
        address,
        oracle,
        getChallenge: this.getChallenge,
        stopSignal,
        stats,
        submitOnFind,
        submitter,
        receiptsLogger,
        emit: event => this.publish(event),
        sleep: this.sleep,
        now: this.now,
      });

      this.oracles.push(oracle);
      this.workers.push(worker);
      this.workerRuns.push(
        worker.run().catch((error: unknown) => {
          Logger.error('orchestrator', `Worker ${id} crashed`, errorMessage(error));
          this.publish({ type: 'worker_error', workerId: id, message: errorMessage(error) });
        })
      );
    }

    Logger.log('orchestrator', `Started ${workers} workers`);
  }

  /**
   * Wait for every worker to observe the stop signal, then release their connections
   */
  async stopWorkers(): Promise<void> {
    await Promise.all(this.workerRuns);
    for (const oracle of this.oracles) {
      oracle.close();
    }
    this.workerRuns = [];
    this.workers = [];
    this.oracles = [];
  }

  /**
   * Run the published challenge until the stop signal is set
   */
  async run(): Promise<RunOutcome> {
    const { stopSignal, stats } = this.options;
    const challenge = this.currentChallenge;

    if (!challenge) {
      Logger.warn('orchestrator', 'No challenge set');
      return { challengeId: null, reason: 'no_challenge', hashes: 0, solutions: 0 };
    }

    const challengeId = challenge.challenge_id;
    const deadline = parseDeadline(challenge.latest_submission);

    Logger.log(
      'orchestrator',
      `Starting with challenge: id=${challengeId} difficulty=${challenge.difficulty} ` +
        `(${getDifficultyZeroBits(challenge.difficulty)} zero bits) expires=${challenge.latest_submission || 'N/A'}`
    );
    this.publish({ type: 'status', active: true, challengeId });

    this.startWorkers();
    let lastStatsAt = this.now();

    try {
      while (!stopSignal.isSet()) {
        await this.sleep(this.pollIntervalMs);

        const current = this.now();
        if (current - lastStatsAt >= this.statsIntervalMs) {
          const snapshot = stats.report();
          Logger.log(
            'stats',
            `hashes=${snapshot.hashes} (${snapshot.hashRate.toFixed(1)} H/s) solutions=${snapshot.solutions}`
          );
          this.publish({ type: 'stats', challengeId, stats: snapshot });
          lastStatsAt = current;
        }

        if (deadline !== null && current > deadline && stopSignal.set('expired')) {
          Logger.warn('orchestrator', `Challenge ${challengeId} expired at ${challenge.latest_submission}`);
        }
      }
    } finally {
      // Only reached with the signal clear if the report loop threw
      stopSignal.set('interrupted');
      Logger.log('orchestrator', 'Stopping workers...');
      await this.stopWorkers();
    }

    // Read after the join: a submission that finished during shutdown decides the reason
    const reason = stopSignal.getReason() ?? 'interrupted';
    const { hashes, solutions } = stats.snapshot();
    this.publish({ type: 'status', active: false, challengeId, reason });

    return { challengeId, reason, hashes, solutions };
  }

  private publish(event: MiningEvent): void {
    this.emit(event.type, event);
    this.emit('event', event);
  }
}
