/**
 * Error Logger
 * Collects submission errors in memory for the whole process and writes them
 * to <address>.<YYYYMMDD_HHMMSS>.txt once, at exit.
 */

import fs from 'fs';
import path from 'path';
import Logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface ErrorLogEntry {
  timestamp: string;
  address: string;
  challenge_id: string;
  nonce: string;
  error: string;
}

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

/**
 * Local-time stamp used in the error log file name
 */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function formatErrorLine(entry: ErrorLogEntry): string {
  return `${entry.timestamp} - ${entry.address}/${entry.challenge_id}/${entry.nonce} - ${entry.error}`;
}

export class ErrorLogger {
  private readonly errors: ErrorLogEntry[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  logError(address: string, challengeId: string, nonce: string, error: string): void {
    this.errors.push({
      timestamp: this.now().toISOString(),
      address,
      challenge_id: challengeId,
      nonce,
      error,
    });
  }

  readErrors(): readonly ErrorLogEntry[] {
    return this.errors;
  }

  /**
   * Write all entries to disk. Returns the file path, or null when there was nothing to write.
   */
  saveErrorsToFile(address: string, directory: string = process.cwd()): string | null {
    if (this.errors.length === 0) {
      return null;
    }

    const filename = path.join(directory, `${address}.${fileTimestamp(this.now())}.txt`);
    const content = this.errors.map(entry => `${formatErrorLine(entry)}\n`).join('');

    try {
      fs.mkdirSync(directory, { recursive: true });
      fs.writeFileSync(filename, content, 'utf-8');
      Logger.log('errors', `Saved ${this.errors.length} error logs to ${filename}`);
      return filename;
    } catch (error: unknown) {
      Logger.error('errors', 'Failed to save error log', errorMessage(error));
      return null;
    }
  }
}
