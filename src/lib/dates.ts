const DAY_MS = 86_400_000;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** Whole calendar days from `from` to `to` (both YYYY-MM-DD). Never negative. */
export function daysBetween(from: string, to: string): number {
  const start = Date.parse(`${from}T00:00:00Z`);
  const end = Date.parse(`${to}T00:00:00Z`);
  if (Number.isNaN(start) || Number.isNaN(end)) return 0;
  return Math.max(0, Math.round((end - start) / DAY_MS));
}

/**
 * Cycle identifier `YYYY-MM-DD#HHmm` in the given IANA timezone, so a morning and
 * an afternoon run on the same trading day get distinct ids.
 */
export function cycleIdFor(date: Date, timeZone = 'UTC'): { cycleId: string; cycleDate: string } {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(p => p.type === type)?.value ?? '00';
  const cycleDate = `${get('year')}-${get('month')}-${get('day')}`;
  return { cycleId: `${cycleDate}#${get('hour')}${get('minute')}`, cycleDate };
}
