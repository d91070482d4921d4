/**
 * Receipts Logger
 * Appends accepted solutions to a JSONL file so a restarted run can skip
 * challenges this address already solved.
 */

import fs from 'fs';
import path from 'path';
import Logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface ReceiptEntry {
  ts: string;
  address: string;
  challenge_id: string;
  nonce: string;
  hash: string;
  statusCode: number;
  response?: unknown;
}

function isReceiptEntry(value: unknown): value is ReceiptEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'ts' in value && typeof value.ts === 'string' &&
    'address' in value && typeof value.address === 'string' &&
    'challenge_id' in value && typeof value.challenge_id === 'string' &&
    'nonce' in value && typeof value.nonce === 'string'
  );
}

export class ReceiptsLogger {
  constructor(private readonly file: string) {}

  getFile(): string {
    return this.file;
  }

  logReceipt(receipt: ReceiptEntry): void {
    try {
      fs.mkdirSync(path.dirname(this.file), { recursive: true });
      fs.appendFileSync(this.file, `${JSON.stringify(receipt)}\n`, 'utf-8');
    } catch (error: unknown) {
      Logger.error('receipts', `Failed to write receipt to ${this.file}`, errorMessage(error));
    }
  }

  /**
   * Read all receipts, skipping lines that do not parse
   */
  readReceipts(): ReceiptEntry[] {
    if (!fs.existsSync(this.file)) {
      return [];
    }

    const receipts: ReceiptEntry[] = [];
    const lines = fs.readFileSync(this.file, 'utf-8').split('\n');
    for (const line of lines) {
      if (line.trim().length === 0) continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isReceiptEntry(parsed)) {
          receipts.push(parsed);
        }
      } catch {
        Logger.warn('receipts', 'Skipping malformed receipt line', line.slice(0, 80));
      }
    }
    return receipts;
  }

  /**
   * Map: address -> set of solved challenge ids
   */
  loadSolvedChallenges(): Map<string, Set<string>> {
    const solved = new Map<string, Set<string>>();
    for (const receipt of this.readReceipts()) {
      let challenges = solved.get(receipt.address);
      if (!challenges) {
        challenges = new Set();
        solved.set(receipt.address, challenges);
      }
      challenges.add(receipt.challenge_id);
    }
    return solved;
  }
}
