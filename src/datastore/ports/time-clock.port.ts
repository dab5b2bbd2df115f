/**
 * Time port.
 *
 * Index records carry creation and deletion dates; the clock is injected so
 * tests can pin them.
 */
export interface TimeClockPort {
  /** Milliseconds since the Unix epoch. */
  nowMs(): number;
}
