/**
 * Custom time manipulations
 */

/** Factors for translating nanoseconds -> microseconds */
const NANO_PER_MICRO = 1_000n
const MICRO_PER_SECOND = 1_000_000
const MICRO_PER_MILLI = 1_000

/**
 * Represents a duration of time at microsecond resolution
 */
export class Duration {
  private readonly _microseconds: number

  private constructor(nanoseconds: bigint) {
    this._microseconds = Number(nanoseconds / NANO_PER_MICRO)
  }

  /**
   * @returns The number of seconds with 6 decimal places for microsecond resolution
   */
  seconds(): number {
    return this._microseconds / MICRO_PER_SECOND
  }

  /**
   * @returns the number of milliseconds with 3 decimal places for microsecond resolution
   */
  milliseconds(): number {
    return this._microseconds / MICRO_PER_MILLI
  }

  microseconds(): number {
    return this._microseconds
  }

  toString(): string {
    return `${this.seconds()}`
  }

  /**
   * Create a {@link Duration} from the nanosecond measurement (from something
   * like {@link process.hrtime.bigint()})
   *
   * @param nanoseconds The number of nanoseconds elapsed
   * @returns A new {@link Duration} object
   */
  static ofNano(nanoseconds: bigint): Duration {
    return new Duration(nanoseconds)
  }

  /**
   * Helper to identify an empty or zero time elapsed duration
   */
  static ZERO: Duration = Duration.ofNano(0n)
}

/**
 * Simple timestamp class to track timings at sub millisecond precision
 */
export class Timestamp {
  private static readonly ORIGIN_NANO: bigint = process.hrtime.bigint()
  private static readonly ORIGIN_UTC: number = Date.now()

  private readonly _nanoseconds: bigint

  constructor(nanoseconds: bigint) {
    this._nanoseconds = nanoseconds
  }

  /**
   * Calculate the elapsed {@link Duration} from this timestamp until the other
   *
   * @param other The later {@link Timestamp}
   * @returns The {@link Duration} between the two or {@link Duration.ZERO} if
   * the other timestamp is not later
   */
  until(other: Timestamp): Duration {
    return other._nanoseconds > this._nanoseconds
      ? Duration.ofNano(other._nanoseconds - this._nanoseconds)
      : Duration.ZERO
  }

  /**
   * @returns The {@link Timestamp} in ISO format
   */
  toISOString(): string {
    const offset = Number(
      (this._nanoseconds - Timestamp.ORIGIN_NANO) / 1_000_000n,
    )
    return new Date(Timestamp.ORIGIN_UTC + offset).toISOString()
  }
}

/**
 * A clock that can be used to track time at sub-millisecond precision
 */
export class HiResClock {
  /**
   * @returns The current {@link Timestamp}
   */
  static timestamp(): Timestamp {
    return new Timestamp(process.hrtime.bigint())
  }
}

/**
 * Custom class that tracks elapsed {@link Duration}
 */
export class Timer {
  private _started?: Timestamp

  get running(): boolean {
    return this._started !== undefined
  }

  /**
   * Start a new timer
   *
   * @returns A new {@link Timer} that has been started
   */
  static startNew(): Timer {
    const timer = new Timer()
    timer.start()
    return timer
  }

  start(): void {
    this._started ??= HiResClock.timestamp()
  }

  /**
   * Stop the timer
   *
   * @returns The {@link Duration} the timer was running or {@link Duration.ZERO} if it was not started
   */
  stop(): Duration {
    const elapsed = this.elapsed()
    this._started = undefined
    return elapsed
  }

  /**
   * Check the current elapsed {@link Duration}
   *
   * @returns The {@link Duration} the timer has been running or {@link Duration.ZERO} if it was not started
   */
  elapsed(): Duration {
    return this._started
      ? this._started.until(HiResClock.timestamp())
      : Duration.ZERO
  }
}
