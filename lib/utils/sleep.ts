export type Sleep = (ms: number) => Promise<void>;

export type Clock = () => number;

/**
 * Sleep helper
 */
export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Let pending I/O callbacks and timers run before continuing a hot loop
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
