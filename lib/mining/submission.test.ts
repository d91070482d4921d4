import axios from 'axios';
import { scriptedAdapter, ScriptedReply, TEST_ADDRESS } from '../../test/helpers';
import { ErrorLogger } from '../storage/error-logger';
import { HttpSolutionSubmitter, solutionUrl } from './submission';

const BASE_URL = 'https://scavenger.test/';

function setup(replies: ScriptedReply[]) {
  const { adapter, requests } = scriptedAdapter(replies);
  const errorLogger = new ErrorLogger(() => new Date('2026-03-04T05:06:07.000Z'));
  const sleeps: number[] = [];
  const submitter = new HttpSolutionSubmitter({
    baseUrl: BASE_URL,
    errorLogger,
    http: axios.create({ adapter }),
    sleep: async ms => {
      sleeps.push(ms);
    },
  });
  return { submitter, requests, errorLogger, sleeps };
}

describe('solutionUrl', () => {
  it('joins base, address, challenge and nonce', () => {
    expect(solutionUrl('https://api.test//', 'addr', '**D01C02', 'abc')).toBe(
      'https://api.test/solution/addr/**D01C02/abc'
    );
  });
});

describe('HttpSolutionSubmitter', () => {
  it('accepts on the first 201 without retrying', async () => {
    const { submitter, requests, errorLogger, sleeps } = setup([{ status: 201, data: { crypto_receipt: 'r' } }]);

    const result = await submitter.submitWithRetry(TEST_ADDRESS, 'C1', '00000000000000aa');

    expect(result).toEqual({ status: 'accepted', attempts: 1, statusCode: 201, response: { crypto_receipt: 'r' } });
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('post');
    expect(requests[0].url).toBe(`https://scavenger.test/solution/${TEST_ADDRESS}/C1/00000000000000aa`);
    expect(requests[0].data).toBe('{}');
    expect(errorLogger.readErrors()).toHaveLength(0);
    expect(sleeps).toEqual([]);
  });

  it('treats any status other than 201 as a failure', async () => {
    const { submitter } = setup([{ status: 200, data: 'ok' }, { status: 201, data: 'created' }]);

    const result = await submitter.submitWithRetry(TEST_ADDRESS, 'C1', 'n');

    expect(result.status).toBe('accepted');
    expect(result.attempts).toBe(2);
  });

  it('retries with a pause between attempts and succeeds on the third', async () => {
    const { submitter, requests, errorLogger, sleeps } = setup([
      { status: 500, data: { message: 'boom' } },
      { status: 503, data: 'Service Unavailable' },
      { status: 201, data: {} },
    ]);

    const result = await submitter.submitWithRetry(TEST_ADDRESS, 'C1', 'n1');

    expect(result).toEqual({ status: 'accepted', attempts: 3, statusCode: 201, response: {} });
    expect(requests).toHaveLength(3);
    expect(sleeps).toEqual([1000, 1000]);
    expect(errorLogger.readErrors().map(e => e.error)).toEqual([
      'HTTP 500: {"message":"boom"}',
      'HTTP 503: Service Unavailable',
    ]);
  });

  it('gives up after three failed attempts and logs each one', async () => {
    const { submitter, requests, errorLogger, sleeps } = setup([
      { status: 500, data: 'e1' },
      { status: 500, data: 'e2' },
      { status: 500, data: 'e3' },
    ]);

    const result = await submitter.submitWithRetry(TEST_ADDRESS, 'C9', 'n9');

    expect(result).toEqual({ status: 'exhausted', attempts: 3, lastError: 'HTTP 500: e3' });
    expect(requests).toHaveLength(3);
    expect(sleeps).toEqual([1000, 1000]);
    expect(errorLogger.readErrors()).toEqual([
      { timestamp: '2026-03-04T05:06:07.000Z', address: TEST_ADDRESS, challenge_id: 'C9', nonce: 'n9', error: 'HTTP 500: e1' },
      { timestamp: '2026-03-04T05:06:07.000Z', address: TEST_ADDRESS, challenge_id: 'C9', nonce: 'n9', error: 'HTTP 500: e2' },
      { timestamp: '2026-03-04T05:06:07.000Z', address: TEST_ADDRESS, challenge_id: 'C9', nonce: 'n9', error: 'HTTP 500: e3' },
    ]);
  });

  it('records transport failures with their error code', async () => {
    const { submitter, errorLogger } = setup([
      { error: 'timeout of 10000ms exceeded' },
      { status: 201, data: {} },
    ]);

    const result = await submitter.submitWithRetry(TEST_ADDRESS, 'C1', 'n');

    expect(result.status).toBe('accepted');
    expect(errorLogger.readErrors().map(e => e.error)).toEqual(['timeout of 10000ms exceeded (ECONNABORTED)']);
  });

  it('classifies a single attempt without throwing', async () => {
    const { submitter } = setup([{ error: 'socket hang up' }, { status: 409, data: { message: 'duplicate' } }]);

    await expect(submitter.submitOnce(TEST_ADDRESS, 'C1', 'n')).resolves.toEqual({
      kind: 'request_failed',
      error: 'socket hang up (ECONNABORTED)',
    });
    await expect(submitter.submitOnce(TEST_ADDRESS, 'C1', 'n')).resolves.toEqual({
      kind: 'rejected',
      statusCode: 409,
      response: { message: 'duplicate' },
    });
  });
});
