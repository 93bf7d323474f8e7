/**
 * Source of the "as-of" instant used by evaluations, transitions and audit
 * timestamps. Bound to SystemClock in the app; tests bind a fixed clock.
 */
export abstract class Clock {
  abstract now(): Date;
}
