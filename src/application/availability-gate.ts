/** Reports whether the process is running in capture (test) mode. */
export type TestModeProbe = () => boolean;

export interface AvailabilityGateOptions {
  forcedUnavailable?: boolean;
  testMode?: TestModeProbe;
}

/**
 * Decides, per publish call, whether the broker path is bypassed.
 *
 * Bypass is active when an operator (or a test) forced the broker
 * unavailable, or when the test mode probe says so. The probe is asked on
 * every call; tests flip the environment between cases.
 *
 * Node runs `setUnavailable()` and `isBypassActive()` on one thread, so a
 * publish always sees either the old flag or the new one.
 */
export class AvailabilityGate {
  private forcedUnavailable: boolean;
  private readonly testMode: TestModeProbe;

  constructor(options: AvailabilityGateOptions = {}) {
    this.forcedUnavailable = options.forcedUnavailable ?? false;
    this.testMode = options.testMode ?? (() => false);
  }

  /** Applies to publishes issued after the call, not to ones in flight. */
  setUnavailable(flag: boolean): void {
    this.forcedUnavailable = flag;
  }

  isForcedUnavailable(): boolean {
    return this.forcedUnavailable;
  }

  isBypassActive(): boolean {
    return this.forcedUnavailable || this.testMode();
  }
}
