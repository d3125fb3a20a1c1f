import type { ClockPort } from "../ports/clock-port";

export class SystemClock implements ClockPort {
  nowSec(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * Clock advanced by hand, for tests and replays
 */
export class ManualClock implements ClockPort {
  constructor(private current: number) {}

  nowSec(): number {
    return this.current;
  }

  set(sec: number): void {
    this.current = sec;
  }

  advance(sec: number): number {
    this.current += sec;
    return this.current;
  }
}
