import axios from 'axios';
import {
  ACCEPTED,
  EXHAUSTED,
  FAILING_HASH,
  FakeSubmitter,
  fakeTime,
  makeChallenge,
  QUALIFYING_HASH,
  scriptedAdapter,
  ScriptedOracle,
  sequentialNonces,
  TEST_ADDRESS,
} from '../../test/helpers';
import { HashOracle } from '../hash/engine';
import { ErrorLogger } from '../storage/error-logger';
import { MiningStatsTracker } from './stats';
import { StopSignal } from './stop-signal';
import { HttpSolutionSubmitter, SolutionSubmitter } from './submission';
import { Challenge, MiningEvent } from './types';
import { MiningWorker, parseDeadline } from './worker';

interface Harness {
  oracle: HashOracle;
  stopSignal?: StopSignal;
  time?: ReturnType<typeof fakeTime>;
  challenge?: () => Challenge | null;
  submitter?: SolutionSubmitter;
  submitOnFind?: boolean;
}

function buildWorker(h: Harness) {
  const time = h.time ?? fakeTime();
  const stopSignal = h.stopSignal ?? new StopSignal();
  const stats = new MiningStatsTracker(time.now);
  const events: MiningEvent[] = [];
  const challenge = makeChallenge();
  const worker = new MiningWorker({
    id: 7,
    address: TEST_ADDRESS,
    oracle: h.oracle,
    getChallenge: h.challenge ?? (() => challenge),
    stopSignal,
    stats,
    submitOnFind: h.submitOnFind ?? true,
    submitter: h.submitter ?? new FakeSubmitter(ACCEPTED),
    emit: event => events.push(event),
    nonceSource: sequentialNonces(),
    sleep: time.sleep,
    now: time.now,
  });
  return { worker, stopSignal, stats, events, time };
}

describe('parseDeadline', () => {
  it('parses ISO timestamps', () => {
    expect(parseDeadline('2026-01-01T00:00:00.000Z')).toBe(Date.parse('2026-01-01T00:00:00.000Z'));
  });

  it('returns null for missing or unparseable values', () => {
    expect(parseDeadline(undefined)).toBeNull();
    expect(parseDeadline('')).toBeNull();
    expect(parseDeadline('soon')).toBeNull();
  });
});

describe('MiningWorker', () => {
  it('sends the keyed preimage for each nonce', async () => {
    const stopSignal = new StopSignal();
    const oracle = new ScriptedOracle([FAILING_HASH], () => stopSignal.set('interrupted'));
    const { worker } = buildWorker({ oracle, stopSignal });

    await worker.run();

    expect(oracle.payloads[0]).toBe(
      `npm-key|0000000000000000${TEST_ADDRESS}**D01C010000ffffnpm-key2099-12-31T23:59:59.000Z123456`
    );
  });

  it('counts only answered exchanges and stops after an accepted solution', async () => {
    const oracle = new ScriptedOracle([null, null, null, QUALIFYING_HASH]);
    const submitter = new FakeSubmitter(ACCEPTED);
    const { worker, stopSignal, stats, events, time } = buildWorker({ oracle, submitter });

    await worker.run();

    expect(oracle.payloads).toHaveLength(4);
    expect(stats.snapshot()).toEqual({ hashes: 1, solutions: 1 });
    expect(stopSignal.getReason()).toBe('solution_accepted');
    expect(submitter.calls).toEqual([{ address: TEST_ADDRESS, challengeId: '**D01C01', nonce: '0000000000000003' }]);
    expect(time.state.sleeps).toEqual([10, 10, 10, 500]);
    expect(events).toEqual([
      { type: 'solution_found', workerId: 7, challengeId: '**D01C01', nonce: '0000000000000003', hash: QUALIFYING_HASH },
      {
        type: 'solution_result',
        workerId: 7,
        challengeId: '**D01C01',
        nonce: '0000000000000003',
        success: true,
        attempts: 1,
        message: 'Solution accepted',
      },
    ]);
  });

  it('keeps hashing past non-qualifying results', async () => {
    const stopSignal = new StopSignal();
    const oracle = new ScriptedOracle([FAILING_HASH, null, FAILING_HASH, FAILING_HASH], () =>
      stopSignal.set('interrupted')
    );
    const { worker, stats } = buildWorker({ oracle, stopSignal });

    await worker.run();

    expect(stats.snapshot()).toEqual({ hashes: 3, solutions: 0 });
    expect(oracle.payloads).toHaveLength(5);
  });

  it('halts the challenge when a valid nonce cannot be submitted', async () => {
    const oracle = new ScriptedOracle([QUALIFYING_HASH]);
    const { worker, stopSignal, events } = buildWorker({ oracle, submitter: new FakeSubmitter(EXHAUSTED) });

    await worker.run();

    expect(stopSignal.getReason()).toBe('submission_exhausted');
    expect(events[1]).toEqual({
      type: 'solution_result',
      workerId: 7,
      challengeId: '**D01C01',
      nonce: '0000000000000000',
      success: false,
      attempts: 3,
      message: 'HTTP 500: boom',
    });
  });

  it('stops after the third submission attempt is accepted', async () => {
    const { adapter, requests } = scriptedAdapter([{ status: 500 }, { status: 500 }, { status: 201, data: {} }]);
    const submitterSleeps: number[] = [];
    const submitter = new HttpSolutionSubmitter({
      baseUrl: 'https://scavenger.test',
      errorLogger: new ErrorLogger(),
      http: axios.create({ adapter }),
      sleep: async ms => {
        submitterSleeps.push(ms);
      },
    });
    const oracle = new ScriptedOracle([QUALIFYING_HASH]);
    const { worker, stopSignal } = buildWorker({ oracle, submitter });

    await worker.run();

    expect(requests).toHaveLength(3);
    expect(submitterSleeps).toEqual([1000, 1000]);
    expect(stopSignal.getReason()).toBe('solution_accepted');
  });

  it('only counts solutions when submission is disabled', async () => {
    const stopSignal = new StopSignal();
    const oracle = new ScriptedOracle([QUALIFYING_HASH, FAILING_HASH, QUALIFYING_HASH], () =>
      stopSignal.set('interrupted')
    );
    const submitter = new FakeSubmitter(ACCEPTED);
    const { worker, stats, events } = buildWorker({ oracle, stopSignal, submitter, submitOnFind: false });

    await worker.run();

    expect(submitter.calls).toHaveLength(0);
    expect(stats.snapshot()).toEqual({ hashes: 3, solutions: 2 });
    expect(events.map(e => e.type)).toEqual(['solution_found', 'solution_found']);
    expect(stopSignal.getReason()).toBe('interrupted');
  });

  it('idles without hashing while no challenge is published', async () => {
    const stopSignal = new StopSignal();
    const oracle = new ScriptedOracle([]);
    let calls = 0;
    const { worker, time } = buildWorker({
      oracle,
      stopSignal,
      challenge: () => {
        calls++;
        if (calls === 2) stopSignal.set('interrupted');
        return null;
      },
    });

    await worker.run();

    expect(oracle.payloads).toHaveLength(0);
    expect(time.state.sleeps).toEqual([500, 500]);
  });

  it('performs no exchanges for an expired challenge', async () => {
    const stopSignal = new StopSignal();
    const oracle = new ScriptedOracle([QUALIFYING_HASH]);
    const expired = makeChallenge({ latest_submission: '2020-01-01T00:00:00.000Z' });
    let calls = 0;
    const { worker, stats } = buildWorker({
      oracle,
      stopSignal,
      challenge: () => {
        calls++;
        if (calls === 3) stopSignal.set('expired');
        return expired;
      },
    });

    await worker.run();

    expect(oracle.payloads).toHaveLength(0);
    expect(stats.snapshot()).toEqual({ hashes: 0, solutions: 0 });
  });

  it('leaves the batch once the deadline passes mid-search', async () => {
    const stopSignal = new StopSignal();
    const time = fakeTime();
    const oracle: HashOracle = {
      async exchange() {
        time.state.now += 1000;
        return FAILING_HASH;
      },
      close: () => undefined,
    };
    const challenge = makeChallenge({ latest_submission: new Date(time.state.now + 2500).toISOString() });
    let calls = 0;
    const { worker, stats } = buildWorker({
      oracle,
      stopSignal,
      time,
      challenge: () => {
        calls++;
        if (calls === 2) stopSignal.set('expired');
        return challenge;
      },
    });

    await worker.run();

    expect(stats.snapshot().hashes).toBe(3);
  });
});
