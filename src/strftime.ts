/**
 * strftime
 *
 * Generic pattern renderer over wall-clock fields plus an offset. It knows
 * nothing about zones: callers pass the abbreviation to print for %Z.
 *
 * Supported flags: `-` (no padding), `_` (space padding), `0` (zero
 * padding), `^` (upper case), followed by an optional width.
 */

import { type CivilTime, weekdayOf, yearDayOf, pad2 } from './civil-time'

export type StrftimeInput = {
  civil: CivilTime
  utcOffsetSeconds: number
  abbreviation: string
  epochSeconds: number
}

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

export const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday']

const DIRECTIVE = /%([-_0^]*)(\d*)(:{0,2})([a-zA-Z%+])/g

const COMPOSITES: Record<string, string> = {
  F: '%Y-%m-%d',
  T: '%H:%M:%S',
  D: '%m/%d/%y',
  x: '%m/%d/%y',
  X: '%H:%M:%S',
  R: '%H:%M',
  r: '%I:%M:%S %p',
  c: '%a %b %e %H:%M:%S %Y',
  '+': '%a %b %e %H:%M:%S %Z %Y',
}

// ============================================================================
// Offsets
// ============================================================================

/**
 * `+HH:MM` (colons = 1), `+HHMM` (0) or `+HH:MM:SS` (2). The sign is `+`
 * for a zero offset.
 */
export function formatOffset(seconds: number, colons = 1): string {
  const sign = seconds < 0 ? '-' : '+'
  const abs = Math.abs(seconds)
  const hours = Math.floor(abs / 3600)
  const minutes = Math.floor((abs % 3600) / 60)
  const secs = abs % 60
  if (colons === 0) return `${sign}${pad2(hours)}${pad2(minutes)}`
  if (colons === 1) return `${sign}${pad2(hours)}:${pad2(minutes)}`
  return `${sign}${pad2(hours)}:${pad2(minutes)}:${pad2(secs)}`
}

// ============================================================================
// Padding
// ============================================================================

function padNumber(value: number, flags: string, width: number, defaultPad: string): string {
  const digits = String(Math.abs(value))
  const sign = value < 0 ? '-' : ''
  if (flags.includes('-')) return sign + digits
  let pad = defaultPad
  if (flags.includes('_')) pad = ' '
  if (flags.includes('0')) pad = '0'
  const body = sign + digits
  if (body.length >= width) return body
  return pad === '0' ? sign + digits.padStart(width - sign.length, '0') : body.padStart(width, ' ')
}

function padText(text: string, flags: string, width: number): string {
  const cased = flags.includes('^') ? text.toUpperCase() : text
  if (flags.includes('-') || cased.length >= width) return cased
  return cased.padStart(width, flags.includes('0') ? '0' : ' ')
}

function fraction(nanosecond: number, digits: number): string {
  const nine = String(nanosecond).padStart(9, '0')
  return digits <= 9 ? nine.slice(0, digits) : nine.padEnd(digits, '0')
}

// ============================================================================
// Rendering
// ============================================================================

function render(input: StrftimeInput, flags: string, width: number, colons: number, conv: string): string | undefined {
  const t = input.civil
  const num = (value: number, defaultWidth: number, defaultPad = '0') =>
    padNumber(value, flags, width || defaultWidth, defaultPad)
  const text = (value: string) => padText(value, flags, width)
  const hour12 = t.hour % 12 === 0 ? 12 : t.hour % 12
  const wday = weekdayOf(t)
  const yday = yearDayOf(t)

  switch (conv) {
    case 'Y': return num(t.year, 4)
    case 'C': return num(Math.floor(t.year / 100), 2)
    case 'y': return num(((t.year % 100) + 100) % 100, 2)
    case 'm': return num(t.month, 2)
    case 'B': return text(MONTH_NAMES[t.month - 1] ?? '')
    case 'b':
    case 'h': return text((MONTH_NAMES[t.month - 1] ?? '').slice(0, 3))
    case 'd': return num(t.day, 2)
    case 'e': return num(t.day, 2, ' ')
    case 'j': return num(yday, 3)
    case 'H': return num(t.hour, 2)
    case 'k': return num(t.hour, 2, ' ')
    case 'I': return num(hour12, 2)
    case 'l': return num(hour12, 2, ' ')
    case 'P': return text(t.hour < 12 ? 'am' : 'pm')
    case 'p': return text(t.hour < 12 ? 'AM' : 'PM')
    case 'M': return num(t.minute, 2)
    case 'S': return num(t.second, 2)
    case 'L': return fraction(t.nanosecond, width || 3)
    case 'N': return fraction(t.nanosecond, width || 9)
    case 'z': return text(formatOffset(input.utcOffsetSeconds, colons))
    case 'Z': return text(input.abbreviation)
    case 'A': return text(DAY_NAMES[wday] ?? '')
    case 'a': return text((DAY_NAMES[wday] ?? '').slice(0, 3))
    case 'u': return num(wday === 0 ? 7 : wday, 1)
    case 'w': return num(wday, 1)
    case 'U': return num(Math.floor((yday - 1 + 7 - wday) / 7), 2)
    case 'W': return num(Math.floor((yday - 1 + 7 - ((wday + 6) % 7)) / 7), 2)
    case 's': return num(input.epochSeconds, 1)
    case 'n': return '\n'
    case 't': return '\t'
    case '%': return '%'
  }

  const composite = COMPOSITES[conv]
  if (composite !== undefined) return text(strftime(input, composite))
  return undefined
}

export function strftime(input: StrftimeInput, pattern: string): string {
  return pattern.replace(DIRECTIVE, (match: string, flags: string, width: string, colons: string, conv: string) => {
    const rendered = render(input, flags, width ? parseInt(width, 10) : 0, colons.length, conv)
    return rendered ?? match
  })
}
