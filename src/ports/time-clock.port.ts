/**
 * Wall-clock port.
 *
 * Time-based one-time passwords derive their counter from the current time;
 * reading it through a port keeps code generation deterministic in tests.
 */
export interface TimeClockPort {
  /**
   * Get current time in milliseconds since Unix epoch.
   */
  nowMs(): number;
}
