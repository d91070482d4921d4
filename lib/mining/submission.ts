/**
 * Solution Submission
 * API format: POST /solution/{address}/{challenge_id}/{nonce}
 */

import axios, { AxiosInstance } from 'axios';
import Logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { sleep as defaultSleep, Sleep } from '../utils/sleep';
import { ErrorLogger } from '../storage/error-logger';

export const SUBMISSION_ACCEPTED_STATUS = 201;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_BACKOFF_MS = 1000;
export const DEFAULT_SUBMISSION_TIMEOUT_MS = 10000;

export type SubmissionAttempt =
  | { kind: 'accepted'; statusCode: number; response: unknown }
  | { kind: 'rejected'; statusCode: number; response: unknown }
  | { kind: 'request_failed'; error: string };

export type SubmissionResult =
  | { status: 'accepted'; attempts: number; statusCode: number; response: unknown }
  | { status: 'exhausted'; attempts: number; lastError: string };

export interface SolutionSubmitterOptions {
  baseUrl: string;
  errorLogger: ErrorLogger;
  http?: AxiosInstance;
  maxAttempts?: number;
  backoffMs?: number;
  timeoutMs?: number;
  sleep?: Sleep;
}

export interface SolutionSubmitter {
  submitWithRetry(address: string, challengeId: string, nonce: string, workerId?: number): Promise<SubmissionResult>;
}

function describeResponse(response: unknown): string {
  if (typeof response === 'string') return response;
  try {
    return JSON.stringify(response) ?? String(response);
  } catch {
    return String(response);
  }
}

export function solutionUrl(baseUrl: string, address: string, challengeId: string, nonce: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/solution/${address}/${challengeId}/${nonce}`;
}

export class HttpSolutionSubmitter implements SolutionSubmitter {
  private readonly http: AxiosInstance;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly timeoutMs: number;
  private readonly sleep: Sleep;

  constructor(private readonly options: SolutionSubmitterOptions) {
    this.http = options.http ?? axios.create();
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.backoffMs = options.backoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SUBMISSION_TIMEOUT_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * One POST, classified. Never throws.
   */
  async submitOnce(address: string, challengeId: string, nonce: string): Promise<SubmissionAttempt> {
    const url = solutionUrl(this.options.baseUrl, address, challengeId, nonce);

    try {
      const response = await this.http.post<unknown>(url, {}, {
        timeout: this.timeoutMs,
        validateStatus: () => true, // every status is classified below
      });

      if (response.status === SUBMISSION_ACCEPTED_STATUS) {
        return { kind: 'accepted', statusCode: response.status, response: response.data };
      }
      return { kind: 'rejected', statusCode: response.status, response: response.data };
    } catch (error: unknown) {
      if (axios.isAxiosError(error)) {
        const code = error.code ? ` (${error.code})` : '';
        return { kind: 'request_failed', error: `${error.message}${code}` };
      }
      return { kind: 'request_failed', error: errorMessage(error) };
    }
  }

  /**
   * Submit up to maxAttempts times with a fixed pause between attempts.
   * Only a 201 counts as success; every failed attempt lands in the error log.
   */
  async submitWithRetry(address: string, challengeId: string, nonce: string, workerId = 0): Promise<SubmissionResult> {
    let lastError = 'no attempt made';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const outcome = await this.submitOnce(address, challengeId, nonce);

      if (outcome.kind === 'accepted') {
        Logger.log(`worker ${workerId}`, `Submit returned: ${outcome.statusCode} ${describeResponse(outcome.response)}`);
        return {
          status: 'accepted',
          attempts: attempt,
          statusCode: outcome.statusCode,
          response: outcome.response,
        };
      }

      lastError =
        outcome.kind === 'rejected'
          ? `HTTP ${outcome.statusCode}: ${describeResponse(outcome.response)}`
          : outcome.error;

      this.options.errorLogger.logError(address, challengeId, nonce, lastError);
      Logger.warn(`worker ${workerId}`, `Submit attempt ${attempt}/${this.maxAttempts} failed: ${lastError}`);

      if (attempt < this.maxAttempts) {
        await this.sleep(this.backoffMs);
      }
    }

    return { status: 'exhausted', attempts: this.maxAttempts, lastError };
  }
}
