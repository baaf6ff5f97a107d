export interface DateRange {
  since: string;
  until: string;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** Local calendar date as YYYY-MM-DD. */
export function todayIso(today: Date = new Date()): string {
  return `${today.getFullYear()}-${pad(today.getMonth() + 1)}-${pad(today.getDate())}`;
}

export function buildDateRange(year: number, today: Date = new Date()): DateRange {
  const since = `${year}-01-01`;
  const until = year === today.getFullYear() ? todayIso(today) : `${year}-12-31`;
  return { since, until };
}
