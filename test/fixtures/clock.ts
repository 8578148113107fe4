import type { Clock, Sleep } from '@session-insights/core';

/** Clock whose `sleep` advances time instead of waiting. */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  readonly sleep: Sleep = async ms => {
    this.sleeps.push(ms);
    this.current += ms;
  };
}
