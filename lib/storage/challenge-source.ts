/**
 * Challenge Source
 * Reads challenges from a CSV file.
 *
 * Columns: A challenge_id, B difficulty, C no_pre_mine, D no_pre_mine_hour, E latest_submission
 * The first row is a header.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { Challenge } from '../mining/types';
import { ChallengeSourceError, errorMessage } from '../utils/errors';
import Logger from '../utils/logger';

// Only for rows without column E; an empty E stays empty and means no deadline
export const DEFAULT_LATEST_SUBMISSION = '2099-12-31T23:59:59.000Z';

function cell(row: string[], index: number): string {
  return (row[index] ?? '').trim();
}

/**
 * Map raw CSV rows (header excluded) to challenges, dropping rows without
 * an id, a difficulty or a no_pre_mine value.
 */
export function rowsToChallenges(rows: string[][]): Challenge[] {
  const challenges: Challenge[] = [];

  for (const row of rows) {
    const challenge: Challenge = {
      challenge_id: cell(row, 0),
      difficulty: cell(row, 1),
      no_pre_mine: cell(row, 2),
      no_pre_mine_hour: cell(row, 3),
      latest_submission: row.length > 4 ? cell(row, 4) : DEFAULT_LATEST_SUBMISSION,
    };

    if (challenge.challenge_id && challenge.difficulty && challenge.no_pre_mine) {
      challenges.push(challenge);
    }
  }

  return challenges;
}

export function parseChallengesCsv(content: string): Challenge[] {
  const records: string[][] = parse(content, {
    relax_column_count: true,
    skip_empty_lines: true,
    bom: true,
  });
  return rowsToChallenges(records.slice(1));
}

export function readChallengesFromCsv(file: string): Challenge[] {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf-8');
  } catch (error: unknown) {
    throw new ChallengeSourceError(file, errorMessage(error));
  }

  let challenges: Challenge[];
  try {
    challenges = parseChallengesCsv(content);
  } catch (error: unknown) {
    throw new ChallengeSourceError(file, errorMessage(error));
  }

  Logger.log('challenges', `Loaded ${challenges.length} challenges from ${file}`);
  return challenges;
}
