import type { ClockPort } from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so fiscal-calendar and deadline logic stay deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}
