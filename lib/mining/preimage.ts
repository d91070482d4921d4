/**
 * Preimage Builder
 *
 * Field order is fixed by the hash service and the submission server:
 * nonce + address + challenge_id + difficulty + no_pre_mine + latest_submission + no_pre_mine_hour
 * All fields are concatenated as-is, no trimming or separators.
 */

import { Challenge } from './types';

export const ORACLE_KEY_DELIMITER = '|';

export function buildPreimage(nonce: string, address: string, challenge: Challenge): string {
  return [
    nonce,
    address,
    challenge.challenge_id,
    challenge.difficulty,
    challenge.no_pre_mine,
    challenge.latest_submission,
    challenge.no_pre_mine_hour ?? '',
  ].join('');
}

/**
 * Payload sent to the hash service. The no_pre_mine prefix lets the service
 * initialize or reuse its ROM for that key without a separate init call.
 */
export function buildOraclePayload(nonce: string, address: string, challenge: Challenge): string {
  return `${challenge.no_pre_mine}${ORACLE_KEY_DELIMITER}${buildPreimage(nonce, address, challenge)}`;
}
