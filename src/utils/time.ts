/**
 * Timer helpers
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  ms > 0 ? new Promise((resolve) => setTimeout(resolve, ms)) : Promise.resolve();
