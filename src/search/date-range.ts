/** Inclusive range of epoch-ms times. */
export interface DateRange {
  start: number;
  end: number;
}

function startOfDay(at: number): Date {
  const date = new Date(at);
  date.setHours(0, 0, 0, 0);
  return date;
}

function addDays(date: Date, days: number): number {
  const shifted = new Date(date.getTime());
  shifted.setDate(shifted.getDate() + days);
  return shifted.getTime();
}

export function isWithin(range: DateRange, at: number): boolean {
  return at >= range.start && at <= range.end;
}

/** Local midnight today to local midnight tomorrow. */
export function today(now: number = Date.now()): DateRange {
  const midnight = startOfDay(now);
  return { start: midnight.getTime(), end: addDays(midnight, 1) };
}

/** Local midnight yesterday to local midnight today. */
export function yesterday(now: number = Date.now()): DateRange {
  const midnight = startOfDay(now);
  return { start: addDays(midnight, -1), end: midnight.getTime() };
}

/** The seven days up to now. */
export function lastWeek(now: number = Date.now()): DateRange {
  return { start: addDays(new Date(now), -7), end: now };
}

/** The thirty days up to now. */
export function lastMonth(now: number = Date.now()): DateRange {
  return { start: addDays(new Date(now), -30), end: now };
}
