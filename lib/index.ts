export * from './mining/types';
export { matchesDifficulty, getDifficultyZeroBits } from './mining/difficulty';
export { generateNonce } from './mining/nonce';
export { buildPreimage, buildOraclePayload, ORACLE_KEY_DELIMITER } from './mining/preimage';
export { StopSignal } from './mining/stop-signal';
export { MiningStatsTracker } from './mining/stats';
export { MiningWorker, parseDeadline } from './mining/worker';
export type { MiningWorkerOptions } from './mining/worker';
export { HttpSolutionSubmitter, solutionUrl } from './mining/submission';
export type { SolutionSubmitter, SubmissionResult, SubmissionAttempt } from './mining/submission';
export { MiningOrchestrator } from './mining/orchestrator';
export type { OrchestratorOptions } from './mining/orchestrator';
export { ChallengeRunner } from './mining/run-loop';
export type { ChallengeRunnerOptions, ChallengeRunSummary } from './mining/run-loop';
export { HashEngineClient, createHashEngineFactory } from './hash/engine';
export type { HashOracle, HashOracleFactory, HashEngineOptions } from './hash/engine';
export { readChallengesFromCsv, parseChallengesCsv } from './storage/challenge-source';
export { ConfigManager } from './storage/config-manager';
export type { MinerConfig } from './storage/config-manager';
export { ErrorLogger } from './storage/error-logger';
export { ReceiptsLogger } from './storage/receipts-logger';
export { ConfigError, ChallengeSourceError } from './utils/errors';
export { default as Logger } from './utils/logger';
