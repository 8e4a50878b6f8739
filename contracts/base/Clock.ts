/**
 * Source of the current block time in seconds.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000)
};

/**
 * Clock that only moves when told to. Used to simulate block time.
 */
export class ManualClock implements Clock {
  private timestamp: number;

  constructor(startTimestamp: number) {
    this.timestamp = startTimestamp;
  }

  now(): number {
    return this.timestamp;
  }

  increaseTime(seconds: number): number {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new RangeError(`Invalid time increment: ${seconds}`);
    }
    this.timestamp += seconds;
    return this.timestamp;
  }

  setTime(timestamp: number): number {
    if (!Number.isInteger(timestamp) || timestamp < this.timestamp) {
      throw new RangeError(
        `Timestamp ${timestamp} is lower than the current timestamp ${this.timestamp}`
      );
    }
    this.timestamp = timestamp;
    return this.timestamp;
  }
}
