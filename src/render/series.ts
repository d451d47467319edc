const DAY_MS = 86_400_000;

export interface MonthlyCount {
  /** YYYY-MM */
  month: string;
  count: number;
}

export interface RollingPoint {
  /** YYYY-MM-DD */
  date: string;
  average: number;
}

export interface Dated {
  published_at: string | null;
}

function dayKey(iso: string): string {
  return iso.slice(0, 10);
}

function dayIndex(day: string): number {
  return Math.floor(Date.parse(`${day}T00:00:00.000Z`) / DAY_MS);
}

function dayFromIndex(index: number): string {
  return new Date(index * DAY_MS).toISOString().slice(0, 10);
}

/**
 * Items per UTC calendar month, from the earliest to the latest dated item.
 * Months without items are present with a zero count. Undated items are ignored.
 */
export function monthlyCounts(items: readonly Dated[]): MonthlyCount[] {
  const counts = new Map<string, number>();
  for (const item of items) {
    if (!item.published_at) continue;
    const month = item.published_at.slice(0, 7);
    counts.set(month, (counts.get(month) ?? 0) + 1);
  }
  if (counts.size === 0) return [];

  const months = [...counts.keys()].sort();
  const [firstYear, firstMonth] = months[0].split('-').map(Number);
  const [lastYear, lastMonth] = months[months.length - 1].split('-').map(Number);

  const result: MonthlyCount[] = [];
  let y = firstYear;
  let m = firstMonth;
  while (y < lastYear || (y === lastYear && m <= lastMonth)) {
    const key = `${y}-${String(m).padStart(2, '0')}`;
    result.push({ month: key, count: counts.get(key) ?? 0 });
    m++;
    if (m > 12) {
      m = 1;
      y++;
    }
  }
  return result;
}

/**
 * Trailing moving average of items per day.
 *
 * The series runs from the earliest item's date to the latest (or `endDate` when later).
 * The value for day D is the item count over the `windowDays` days ending on D, divided by
 * `windowDays`; days without items, including days before the first item, count as zero.
 */
export function rollingAverage(
  items: readonly Dated[],
  windowDays = 90,
  opts: { endDate?: string } = {},
): RollingPoint[] {
  if (!Number.isInteger(windowDays) || windowDays < 1) {
    throw new RangeError(`windowDays must be a positive integer, got ${windowDays}`);
  }

  const perDay = new Map<number, number>();
  for (const item of items) {
    if (!item.published_at) continue;
    const idx = dayIndex(dayKey(item.published_at));
    perDay.set(idx, (perDay.get(idx) ?? 0) + 1);
  }
  if (perDay.size === 0) return [];

  const indices = [...perDay.keys()];
  const first = Math.min(...indices);
  let last = Math.max(...indices);
  if (opts.endDate) last = Math.max(last, dayIndex(dayKey(opts.endDate)));

  const daily: number[] = [];
  for (let d = first; d <= last; d++) daily.push(perDay.get(d) ?? 0);

  const points: RollingPoint[] = [];
  let windowSum = 0;
  for (let i = 0; i < daily.length; i++) {
    windowSum += daily[i];
    if (i >= windowDays) windowSum -= daily[i - windowDays];
    points.push({ date: dayFromIndex(first + i), average: windowSum / windowDays });
  }
  return points;
}

export interface SpanSummary {
  first: string | null;
  last: string | null;
  total: number;
}

export function spanSummary(items: readonly Dated[]): SpanSummary {
  let first: string | null = null;
  let last: string | null = null;
  for (const item of items) {
    if (!item.published_at) continue;
    if (first === null || item.published_at < first) first = item.published_at;
    if (last === null || item.published_at > last) last = item.published_at;
  }
  return { first, last, total: items.length };
}
