export interface Clock {
  /** Monotonic milliseconds. */
  now(): number;
}

export type Sleep = (ms: number) => Promise<void>;

export const systemClock: Clock = {
  now: () => performance.now()
};

export const sleep: Sleep = ms =>
  new Promise(resolve => {
    setTimeout(resolve, ms);
  });
