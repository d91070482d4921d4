/**
 * Mining Worker
 * Owns one hash oracle connection and searches nonces for the published challenge
 * until the stop signal is set.
 */

import { HashOracle } from '../hash/engine';
import Logger from '../utils/logger';
import { Clock, sleep as defaultSleep, Sleep, yieldToEventLoop } from '../utils/sleep';
import { ReceiptsLogger } from '../storage/receipts-logger';
import { matchesDifficulty } from './difficulty';
import { generateNonce } from './nonce';
import { buildOraclePayload } from './preimage';
import { MiningStatsTracker } from './stats';
import { StopSignal } from './stop-signal';
import { SolutionSubmitter } from './submission';
import { Challenge, MiningEventListener } from './types';

export const NONCE_BATCH = 1024; // nonces tried before re-checking the published challenge
export const IDLE_DELAY_MS = 500;
export const ORACLE_RETRY_DELAY_MS = 10;
export const POST_SOLUTION_DELAY_MS = 500;

export interface MiningWorkerOptions {
  id: number;
  address: string;
  oracle: HashOracle;
  getChallenge: () => Challenge | null;
  stopSignal: StopSignal;
  stats: MiningStatsTracker;
  submitOnFind: boolean;
  submitter: SolutionSubmitter;
  receiptsLogger?: ReceiptsLogger;
  emit?: MiningEventListener;
  nonceBatch?: number;
  idleDelayMs?: number;
  oracleRetryDelayMs?: number;
  postSolutionDelayMs?: number;
  nonceSource?: () => string;
  sleep?: Sleep;
  now?: Clock;
}

/**
 * Parse latest_submission; null means "no deadline check"
 */
export function parseDeadline(latestSubmission: string | undefined): number | null {
  if (!latestSubmission) return null;
  const ts = Date.parse(latestSubmission);
  return Number.isNaN(ts) ? null : ts;
}

export class MiningWorker {
  readonly id: number;
  private readonly sleep: Sleep;
  private readonly now: Clock;
  private readonly nonceBatch: number;
  private readonly idleDelayMs: number;
  private readonly oracleRetryDelayMs: number;
  private readonly postSolutionDelayMs: number;
  private readonly nonceSource: () => string;

  constructor(private readonly options: MiningWorkerOptions) {
    this.id = options.id;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.nonceBatch = options.nonceBatch ?? NONCE_BATCH;
    this.idleDelayMs = options.idleDelayMs ?? IDLE_DELAY_MS;
    this.oracleRetryDelayMs = options.oracleRetryDelayMs ?? ORACLE_RETRY_DELAY_MS;
    this.postSolutionDelayMs = options.postSolutionDelayMs ?? POST_SOLUTION_DELAY_MS;
    this.nonceSource = options.nonceSource ?? generateNonce;
  }

  async run(): Promise<void> {
    const { stopSignal, getChallenge } = this.options;
    Logger.debug(this.category(), 'started');

    while (!stopSignal.isSet()) {
      const challenge = getChallenge();
      if (!challenge) {
        await this.sleep(this.idleDelayMs);
        continue;
      }

      const deadline = parseDeadline(challenge.latest_submission);
      if (deadline !== null && this.now() > deadline) {
        // Expired: wait for a rotation or for the orchestrator to end the run
        await this.sleep(this.idleDelayMs);
        continue;
      }

      await this.searchBatch(challenge, deadline);
      await yieldToEventLoop();
    }

    Logger.debug(this.category(), 'stopping');
  }

  private async searchBatch(challenge: Challenge, deadline: number | null): Promise<void> {
    const { address, oracle, stopSignal, stats } = this.options;

    for (let i = 0; i < this.nonceBatch; i++) {
      if (stopSignal.isSet()) return;
      if (deadline !== null && this.now() > deadline) return;

      const nonce = this.nonceSource();
      const hash = await oracle.exchange(buildOraclePayload(nonce, address, challenge));
      if (hash === null) {
        await this.sleep(this.oracleRetryDelayMs);
        continue;
      }

      stats.addHashes(1);
      if (!matchesDifficulty(hash, challenge.difficulty)) {
        continue;
      }

      await this.onSolution(challenge, nonce, hash);
      await this.sleep(this.postSolutionDelayMs);
      return; // re-acquire: the published challenge may have rotated
    }
  }

  private async onSolution(challenge: Challenge, nonce: string, hash: string): Promise<void> {
    const { address, stats, stopSignal, submitter, emit } = this.options;
    const challengeId = challenge.challenge_id;

    Logger.log(this.category(), `FOUND nonce=${nonce} hash=${hash} challenge=${challengeId}`);
    stats.incSolutions();
    emit?.({ type: 'solution_found', workerId: this.id, challengeId, nonce, hash });

    if (!this.options.submitOnFind) {
      return;
    }

    const result = await submitter.submitWithRetry(address, challengeId, nonce, this.id);

    if (result.status === 'accepted') {
      stopSignal.set('solution_accepted');
      this.options.receiptsLogger?.logReceipt({
        ts: new Date(this.now()).toISOString(),
        address,
        challenge_id: challengeId,
        nonce,
        hash,
        statusCode: result.statusCode,
        response: result.response,
      });
      emit?.({
        type: 'solution_result',
        workerId: this.id,
        challengeId,
        nonce,
        success: true,
        attempts: result.attempts,
        message: 'Solution accepted',
      });
      return;
    }

    // A valid nonce must not be searched over and lost: halt this challenge for the operator
    Logger.error(
      this.category(),
      `FAILED TO SUBMIT VALID NONCE after ${result.attempts} attempts, stopping to avoid losing it`,
      { challengeId, nonce, hash, lastError: result.lastError }
    );
    stopSignal.set('submission_exhausted');
    emit?.({
      type: 'solution_result',
      workerId: this.id,
      challengeId,
      nonce,
      success: false,
      attempts: result.attempts,
      message: result.lastError,
    });
  }

  private category(): string {
    return `worker ${this.id}`;
  }
}
