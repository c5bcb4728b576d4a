const DAY_MS = 24 * 60 * 60 * 1000
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

export function yesterdayUTC(now: Date = new Date()): string {
  return new Date(now.getTime() - DAY_MS).toISOString().slice(0, 10)
}

/** True only for a real calendar date written as YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false
  const parsed = new Date(`${value}T00:00:00Z`)
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value
}

/** Half-open UTC window [date 00:00Z, date+1 00:00Z). */
export function dayWindow(date: string): { since: string; until: string } {
  const start = new Date(`${date}T00:00:00Z`)
  const end = new Date(start.getTime() + DAY_MS)
  return {
    since: `${date}T00:00:00Z`,
    until: `${end.toISOString().slice(0, 10)}T00:00:00Z`,
  }
}
