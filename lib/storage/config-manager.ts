/**
 * Configuration Manager
 * Resolves start-up configuration: defaults < environment (.env) < CLI flags.
 * Read once; nothing is re-read during a run.
 */

import { parseArgs } from 'util';
import dotenv from 'dotenv';
import { ConfigError, errorMessage } from '../utils/errors';

export interface MinerConfig {
  address: string;
  baseUrl: string;
  daemonHost: string;
  daemonPort: number;
  workers: number;
  submitOnFind: boolean;
  csvFile: string;
  statsIntervalSeconds: number;
  receiptsFile: string;
  errorLogDir: string;
}

export const DEFAULT_CONFIG: Omit<MinerConfig, 'address'> = {
  baseUrl: 'https://scavenger.prod.gd.midnighttge.io',
  daemonHost: '127.0.0.1',
  daemonPort: 4002,
  workers: 8,
  submitOnFind: true,
  csvFile: 'challenges.csv',
  statsIntervalSeconds: 10,
  receiptsFile: 'storage/receipts.jsonl',
  errorLogDir: '.',
};

export const USAGE = `Usage: challenge-miner [options]

  --address <addr>          Address to mine for (MINER_ADDRESS)
  --base-url <url>          Submission API base URL (MINER_BASE_URL)
  --daemon-host <host>      Hash service host (HASH_ENGINE_HOST)
  --daemon-port <port>      Hash service port (HASH_ENGINE_PORT)
  --workers <n>             Number of workers (MINER_WORKERS)
  --submit / --no-submit    Submit solutions when found (MINER_SUBMIT)
  --csv-file <file>         CSV file containing challenges (MINER_CSV_FILE)
  --stats-interval <sec>    Seconds between throughput reports (MINER_STATS_INTERVAL)
  --receipts-file <file>    JSONL file of accepted solutions (MINER_RECEIPTS_FILE)
  --error-log-dir <dir>     Directory for the exit error log (MINER_ERROR_LOG_DIR)
  -h, --help                Show this help
`;

export type Environment = Record<string, string | undefined>;

export interface ParsedCommandLine {
  help: boolean;
  config: MinerConfig;
}

function parseInteger(name: string, value: string, min: number, max: number): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < min || parsed > max) {
    throw new ConfigError(`${name} must be between ${min} and ${max}, got ${parsed}`);
  }
  return parsed;
}

function parsePositiveNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive number, got "${value}"`);
  }
  return parsed;
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${value}"`);
}

function parseBaseUrl(name: string, value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError(`${name} is not a valid URL: "${value}"`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`${name} must use http or https, got "${url.protocol}"`);
  }
  return value.replace(/\/+$/, '');
}

function pick(flag: string | undefined, env: string | undefined): string | undefined {
  if (flag !== undefined) return flag;
  if (env !== undefined && env.trim().length > 0) return env;
  return undefined;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        address: { type: 'string' },
        'base-url': { type: 'string' },
        'daemon-host': { type: 'string' },
        'daemon-port': { type: 'string' },
        workers: { type: 'string' },
        submit: { type: 'boolean' },
        'no-submit': { type: 'boolean' },
        'csv-file': { type: 'string' },
        'stats-interval': { type: 'string' },
        'receipts-file': { type: 'string' },
        'error-log-dir': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (error: unknown) {
    throw new ConfigError(errorMessage(error));
  }
}

export class ConfigManager {
  constructor(private readonly env: Environment = process.env) {}

  /**
   * Load .env into process.env without overriding variables already set
   */
  static loadDotEnv(): void {
    dotenv.config();
  }

  parse(argv: string[]): ParsedCommandLine {
    const values = readFlags(argv);

    const help = values.help === true;
    const env = this.env;

    const address = pick(values.address, env.MINER_ADDRESS)?.trim() ?? '';
    if (!help && address.length === 0) {
      throw new ConfigError('An address is required (--address or MINER_ADDRESS)');
    }
    if (/[\s/]/.test(address)) {
      throw new ConfigError(`Address must not contain whitespace or '/': "${address}"`);
    }

    if (values.submit === true && values['no-submit'] === true) {
      throw new ConfigError('--submit and --no-submit are mutually exclusive');
    }
    let submitOnFind = DEFAULT_CONFIG.submitOnFind;
    if (values.submit === true) {
      submitOnFind = true;
    } else if (values['no-submit'] === true) {
      submitOnFind = false;
    } else if (env.MINER_SUBMIT !== undefined && env.MINER_SUBMIT.trim().length > 0) {
      submitOnFind = parseBoolean('MINER_SUBMIT', env.MINER_SUBMIT);
    }

    const baseUrl = pick(values['base-url'], env.MINER_BASE_URL);
    const daemonPort = pick(values['daemon-port'], env.HASH_ENGINE_PORT);
    const workers = pick(values.workers, env.MINER_WORKERS);
    const statsInterval = pick(values['stats-interval'], env.MINER_STATS_INTERVAL);

    const config: MinerConfig = {
      address,
      baseUrl: baseUrl !== undefined ? parseBaseUrl('base URL', baseUrl) : DEFAULT_CONFIG.baseUrl,
      daemonHost: pick(values['daemon-host'], env.HASH_ENGINE_HOST) ?? DEFAULT_CONFIG.daemonHost,
      daemonPort: daemonPort !== undefined ? parseInteger('daemon port', daemonPort, 1, 65535) : DEFAULT_CONFIG.daemonPort,
      workers: workers !== undefined ? parseInteger('workers', workers, 1, 1024) : DEFAULT_CONFIG.workers,
      submitOnFind,
      csvFile: pick(values['csv-file'], env.MINER_CSV_FILE) ?? DEFAULT_CONFIG.csvFile,
      statsIntervalSeconds:
        statsInterval !== undefined ? parsePositiveNumber('stats interval', statsInterval) : DEFAULT_CONFIG.statsIntervalSeconds,
      receiptsFile: pick(values['receipts-file'], env.MINER_RECEIPTS_FILE) ?? DEFAULT_CONFIG.receiptsFile,
      errorLogDir: pick(values['error-log-dir'], env.MINER_ERROR_LOG_DIR) ?? DEFAULT_CONFIG.errorLogDir,
    };

    return { help, config };
  }
}
