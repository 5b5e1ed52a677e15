import type { TimeClockPort } from '../../../ports/time-clock.port.js';

/**
 * Node time adapter using platform APIs.
 */
export class NodeTimeClock implements TimeClockPort {
  nowMs(): number {
    return Date.now();
  }
}
