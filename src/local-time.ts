/** Wall-clock view of an instant in a given timezone. */
export interface LocalTime {
  instant: Date
  timeZone: string
  /** `YYYY-MM-DD` in `timeZone`. */
  date: string
  hour: number
  minute: number
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/
const NAIVE_DATETIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?$/
const HAS_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/i

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone })
    return true
  } catch {
    return false
  }
}

interface WallClock {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

function wallClock(instant: Date, timeZone: string): WallClock {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  })
  const parts = new Map(formatter.formatToParts(instant).map((p) => [p.type, p.value]))
  const part = (type: Intl.DateTimeFormatPartTypes): number => Number(parts.get(type) ?? 0)
  return {
    year: part('year'),
    month: part('month'),
    day: part('day'),
    hour: part('hour'),
    minute: part('minute'),
    second: part('second'),
  }
}

const pad = (n: number): string => String(n).padStart(2, '0')

function isoDate(clock: WallClock): string {
  return `${clock.year}-${pad(clock.month)}-${pad(clock.day)}`
}

/** Offset of `timeZone` from UTC at `instant`, in milliseconds. */
function zoneOffsetMs(instant: Date, timeZone: string): number {
  const c = wallClock(instant, timeZone)
  const asUtc = Date.UTC(c.year, c.month - 1, c.day, c.hour, c.minute, c.second)
  const wholeSeconds = instant.getTime() - instant.getUTCMilliseconds()
  return asUtc - wholeSeconds
}

export function toLocalTime(instant: Date, timeZone: string): LocalTime {
  const clock = wallClock(instant, timeZone)
  return {
    instant,
    timeZone,
    date: isoDate(clock),
    hour: clock.hour,
    minute: clock.minute,
  }
}

/** `YYYY-MM-DD HH:MM` in `timeZone`. */
export function formatLocal(instant: Date, timeZone: string): string {
  const clock = wallClock(instant, timeZone)
  return `${isoDate(clock)} ${pad(clock.hour)}:${pad(clock.minute)}`
}

function isRealDate(year: number, month: number, day: number): boolean {
  const d = new Date(Date.UTC(year, month - 1, day))
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day
}

/** A calendar date `YYYY-MM-DD`, or `null` when absent or malformed. */
export function parseDueDate(value: string | null): string | null {
  if (!value) return null
  const match = DATE_ONLY.exec(value)
  if (!match) return null
  const [, y, m, d] = match
  return isRealDate(Number(y), Number(m), Number(d)) ? value : null
}

/**
 * An instant from a due datetime. Values carrying `Z` or an offset are absolute;
 * zone-less values are wall-clock time in `timeZone`. Malformed values yield `null`.
 */
export function parseDueDatetime(value: string | null, timeZone: string): Date | null {
  if (!value) return null
  const trimmed = value.trim()

  if (HAS_OFFSET.test(trimmed)) {
    const instant = new Date(trimmed)
    return Number.isNaN(instant.getTime()) ? null : instant
  }

  const match = NAIVE_DATETIME.exec(trimmed)
  if (!match) return null
  const [, y, mo, d, h, mi, s] = match
  const year = Number(y)
  const month = Number(mo)
  const day = Number(d)
  const hour = Number(h)
  const minute = Number(mi)
  const second = Number(s ?? 0)
  if (!isRealDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
    return null
  }

  const guess = Date.UTC(year, month - 1, day, hour, minute, second)
  const firstOffset = zoneOffsetMs(new Date(guess), timeZone)
  let utcMs = guess - firstOffset
  // Re-check across a DST boundary.
  const secondOffset = zoneOffsetMs(new Date(utcMs), timeZone)
  if (secondOffset !== firstOffset) {
    utcMs = guess - secondOffset
  }
  return new Date(utcMs)
}
