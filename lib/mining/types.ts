export interface Challenge {
  challenge_id: string;
  difficulty: string;
  no_pre_mine: string;
  latest_submission: string;
  no_pre_mine_hour: string;
}

export type StopReason = 'solution_accepted' | 'submission_exhausted' | 'expired' | 'interrupted';

export type RunReason = StopReason | 'no_challenge';

export interface RunOutcome {
  challengeId: string | null;
  reason: RunReason;
  hashes: number;
  solutions: number;
}

export interface StatsSnapshot {
  hashes: number;
  solutions: number;
  hashRate: number; // H/s since the previous report
  elapsedSeconds: number;
}

export interface StatusEvent {
  type: 'status';
  active: boolean;
  challengeId: string | null;
  reason?: RunReason;
}

export interface StatsEvent {
  type: 'stats';
  challengeId: string;
  stats: StatsSnapshot;
}

export interface SolutionFoundEvent {
  type: 'solution_found';
  workerId: number;
  challengeId: string;
  nonce: string;
  hash: string;
}

export interface SolutionResultEvent {
  type: 'solution_result';
  workerId: number;
  challengeId: string;
  nonce: string;
  success: boolean;
  attempts: number;
  message: string;
}

export interface WorkerErrorEvent {
  type: 'worker_error';
  workerId?: number;
  message: string;
}

export type MiningEvent = StatusEvent | StatsEvent | SolutionFoundEvent | SolutionResultEvent | WorkerErrorEvent;

export type MiningEventListener = (event: MiningEvent) => void;
