import { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from 'axios';
import { HashOracle } from '../lib/hash/engine';
import { SolutionSubmitter, SubmissionResult } from '../lib/mining/submission';
import { Challenge } from '../lib/mining/types';

export const TEST_ADDRESS = 'addr_test1';

export const QUALIFYING_HASH = '0000abcd' + 'ee'.repeat(28);
export const FAILING_HASH = 'ffff0000' + 'ee'.repeat(28);

export function makeChallenge(overrides: Partial<Challenge> = {}): Challenge {
  return {
    challenge_id: '**D01C01',
    difficulty: '0000ffff',
    no_pre_mine: 'npm-key',
    latest_submission: '2099-12-31T23:59:59.000Z',
    no_pre_mine_hour: '123456',
    ...overrides,
  };
}

/**
 * Oracle that answers from a script; once the script is empty it calls onExhausted
 * and keeps answering null.
 */
export class ScriptedOracle implements HashOracle {
  readonly payloads: string[] = [];
  closed = false;

  constructor(
    private readonly script: Array<string | null>,
    private readonly onExhausted: () => void = () => undefined
  ) {}

  async exchange(payload: string): Promise<string | null> {
    this.payloads.push(payload);
    if (this.script.length === 0) {
      this.onExhausted();
      return null;
    }
    return this.script.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }
}

export class FakeSubmitter implements SolutionSubmitter {
  readonly calls: Array<{ address: string; challengeId: string; nonce: string }> = [];

  constructor(private readonly result: SubmissionResult) {}

  async submitWithRetry(address: string, challengeId: string, nonce: string): Promise<SubmissionResult> {
    this.calls.push({ address, challengeId, nonce });
    return this.result;
  }
}

export const ACCEPTED: SubmissionResult = { status: 'accepted', attempts: 1, statusCode: 201, response: { ok: true } };
export const EXHAUSTED: SubmissionResult = { status: 'exhausted', attempts: 3, lastError: 'HTTP 500: boom' };

/**
 * Sleep that records the requested delay and resolves on the next macrotask,
 * advancing a fake clock by the requested amount.
 */
export function fakeTime(start = Date.parse('2026-01-01T00:00:00.000Z')) {
  const sleeps: number[] = [];
  const state = { now: start, sleeps };
  return {
    state,
    now: () => state.now,
    sleep: (ms: number) =>
      new Promise<void>(resolve => {
        state.sleeps.push(ms);
        state.now += ms;
        setImmediate(resolve);
      }),
  };
}

export function sequentialNonces(): () => string {
  let n = 0;
  return () => (n++).toString(16).padStart(16, '0');
}

export interface ScriptedReply {
  status?: number;
  data?: unknown;
  error?: string;
}

/**
 * axios adapter answering from a script, recording every request
 */
export function scriptedAdapter(replies: ScriptedReply[]) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async config => {
    requests.push(config);
    const reply = replies.shift() ?? { status: 500, data: 'script exhausted' };
    if (reply.error) {
      throw new AxiosError(reply.error, 'ECONNABORTED', config);
    }
    return {
      data: reply.data,
      status: reply.status ?? 200,
      statusText: '',
      headers: {},
      config,
    };
  };
  return { adapter, requests };
}
