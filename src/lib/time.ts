// Time utilities. Time-of-day values are local server time, like the stored timestamps' wall clock.

const HH_MM = /^([01]\d|2[0-3]):([0-5]\d)$/

export type TimeOfDay = { hours: number; minutes: number }

export function parseTimeOfDay(hhmm: string): TimeOfDay | null {
  const m = HH_MM.exec(hhmm)
  if (!m) return null
  return { hours: parseInt(m[1], 10), minutes: parseInt(m[2], 10) }
}

export function formatTimeOfDay(t: TimeOfDay): string {
  return `${String(t.hours).padStart(2, '0')}:${String(t.minutes).padStart(2, '0')}`
}

export function secondsOfDay(date: Date): number {
  return date.getHours() * 3600 + date.getMinutes() * 60 + date.getSeconds()
}

export function timeOfDaySeconds(t: TimeOfDay): number {
  return t.hours * 3600 + t.minutes * 60
}

function startOfDay(date: Date): Date {
  const d = new Date(date)
  d.setHours(0, 0, 0, 0)
  return d
}

// Whole calendar days from `from` to `to`; rounding absorbs DST shifts.
export function calendarDaysBetween(from: Date, to: Date): number {
  return Math.round((startOfDay(to).getTime() - startOfDay(from).getTime()) / 86_400_000)
}

export function hoursBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 3_600_000
}
