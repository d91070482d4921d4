export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ChallengeSourceError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(`Failed to read challenges from ${file}: ${message}`);
    this.name = 'ChallengeSourceError';
    this.file = file;
  }
}

/**
 * Best-effort message extraction for values caught as unknown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
