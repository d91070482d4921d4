#!/usr/bin/env node
/**
 * challenge-miner CLI
 * Reads challenges from CSV, mines them one by one against the local hash service
 * and submits solutions. Writes the error log once on exit.
 */

import { createHashEngineFactory } from '../lib/hash/engine';
import { ChallengeRunner } from '../lib/mining/run-loop';
import { HttpSolutionSubmitter } from '../lib/mining/submission';
import { readChallengesFromCsv } from '../lib/storage/challenge-source';
import { ConfigManager, MinerConfig, USAGE } from '../lib/storage/config-manager';
import { ErrorLogger } from '../lib/storage/error-logger';
import { ReceiptsLogger } from '../lib/storage/receipts-logger';
import { ChallengeSourceError, ConfigError, errorMessage } from '../lib/utils/errors';
import Logger from '../lib/utils/logger';

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_CONFIG = 2;
const EXIT_INTERRUPTED = 130;

const errorLogger = new ErrorLogger();

async function mine(config: MinerConfig): Promise<number> {
  const challenges = readChallengesFromCsv(config.csvFile);
  if (challenges.length === 0) {
    Logger.warn('main', `No challenges found in ${config.csvFile}`);
    return EXIT_OK;
  }

  const runner = new ChallengeRunner({
    address: config.address,
    workers: config.workers,
    submitOnFind: config.submitOnFind,
    oracleFactory: createHashEngineFactory({ host: config.daemonHost, port: config.daemonPort }),
    submitter: new HttpSolutionSubmitter({ baseUrl: config.baseUrl, errorLogger }),
    receiptsLogger: new ReceiptsLogger(config.receiptsFile),
    statsIntervalMs: config.statsIntervalSeconds * 1000,
  });

  let signals = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    signals++;
    if (signals > 1) {
      Logger.warn('main', `Received ${signal} again, exiting immediately`);
      errorLogger.saveErrorsToFile(config.address, config.errorLogDir);
      process.exit(EXIT_INTERRUPTED);
    }
    Logger.warn('main', `Received ${signal}, stopping workers...`);
    runner.interrupt();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const summary = await runner.run(challenges);
    const exhausted = summary.completed.filter(o => o.reason === 'submission_exhausted');
    for (const outcome of exhausted) {
      Logger.error('main', `Valid nonce for ${outcome.challengeId} was NOT accepted; see the error log`);
    }
    return summary.interrupted ? EXIT_INTERRUPTED : EXIT_OK;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

async function main(argv: string[]): Promise<number> {
  ConfigManager.loadDotEnv();

  let config: MinerConfig;
  try {
    const parsed = new ConfigManager().parse(argv);
    if (parsed.help) {
      console.log(USAGE);
      return EXIT_OK;
    }
    config = parsed.config;
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      Logger.error('config', error.message);
      console.error(USAGE);
      return EXIT_CONFIG;
    }
    throw error;
  }

  try {
    return await mine(config);
  } catch (error: unknown) {
    if (error instanceof ChallengeSourceError) {
      Logger.error('challenges', error.message);
      return EXIT_FAILURE;
    }
    Logger.error('main', 'Fatal error', errorMessage(error));
    return EXIT_FAILURE;
  } finally {
    errorLogger.saveErrorsToFile(config.address, config.errorLogDir);
  }
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    Logger.error('main', 'Unhandled error', errorMessage(error));
    process.exitCode = EXIT_FAILURE;
  }
);
