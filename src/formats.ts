/**
 * Named Formats
 *
 * Built-in toString() formats, plus any registered through configure().
 * A format is either a strftime pattern or a renderer function.
 */

import { getConfig } from './config'

/** What a renderer function may ask of the time it formats */
export interface FormattableTime {
  strftime(pattern: string): string
  day(): number
  formattedOffset(colon?: boolean, alternateUtc?: string): string
  xmlschema(fractionDigits?: number): string
}

export type TimeFormat = string | ((time: FormattableTime) => string)

export function ordinalize(n: number): string {
  const abs = Math.abs(n)
  if (abs % 100 >= 11 && abs % 100 <= 13) return `${n}th`
  switch (abs % 10) {
    case 1: return `${n}st`
    case 2: return `${n}nd`
    case 3: return `${n}rd`
    default: return `${n}th`
  }
}

export const TIME_FORMATS: Readonly<Record<string, TimeFormat>> = {
  db: '%Y-%m-%d %H:%M:%S',
  inspect: '%Y-%m-%d %H:%M:%S.%9N %z',
  number: '%Y%m%d%H%M%S',
  nsec: '%Y%m%d%H%M%S%9N',
  usec: '%Y%m%d%H%M%S%6N',
  time: '%H:%M',
  short: '%d %b %H:%M',
  long: '%B %d, %Y %H:%M',
  long_ordinal: (time) => time.strftime(`%B ${ordinalize(time.day())}, %Y %H:%M`),
  rfc822: (time) => time.strftime(`%a, %d %b %Y %H:%M:%S ${time.formattedOffset(false)}`),
  iso8601: (time) => time.xmlschema(),
}

/** Configured formats shadow the built-in ones */
export function lookupFormat(name: string): TimeFormat | undefined {
  const configured = getConfig().formats
  if (Object.hasOwn(configured, name)) return configured[name]
  if (Object.hasOwn(TIME_FORMATS, name)) return TIME_FORMATS[name]
  return undefined
}

export function applyFormat(format: TimeFormat, time: FormattableTime): string {
  return typeof format === 'function' ? format(time) : time.strftime(format)
}
