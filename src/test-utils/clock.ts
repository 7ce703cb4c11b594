import { Clock } from '../utils/dates';

/**
 * Clock that only moves when a test moves it
 */
export class FakeClock implements Clock {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = date;
  }
}

/** Local-time date, so calendar dates do not depend on the machine's zone */
export function at(year: number, month: number, day: number, hours = 9, minutes = 0): Date {
  return new Date(year, month - 1, day, hours, minutes);
}
