export interface Clock {
  /** Nanoseconds since the Unix epoch, as a decimal string */
  now(): string;
}

/**
 * Wall-clock anchored nanosecond clock. Readings are strictly increasing
 * within the process, so every note gets a distinct timestamp field.
 */
export class NanoClock implements Clock {
  private readonly originEpochNs = BigInt(Date.now()) * 1_000_000n;
  private readonly originHrtime = process.hrtime.bigint();
  private last = 0n;

  now(): string {
    let current = this.originEpochNs + (process.hrtime.bigint() - this.originHrtime);
    if (current <= this.last) {
      current = this.last + 1n;
    }
    this.last = current;
    return current.toString();
  }
}
