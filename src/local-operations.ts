/**
 * Local Operations
 *
 * The wall-clock operations a ZonedTime forwards to its local fields. The
 * table is closed: ZonedTime.perform() dispatches only to these names and
 * wraps any civil-time result back into its zone.
 */

import {
  type CivilTime,
  type CivilRange,
  addDays,
  addMonths,
  addSeconds,
  daysInMonth,
  weekdayOf,
  yearDayOf,
  NANOS_PER_SECOND,
} from './civil-time'

export type LocalResult = CivilTime | CivilRange | number | boolean

export type LocalOperation = (time: CivilTime, ...args: number[]) => LocalResult

const LAST_NANO = NANOS_PER_SECOND - 1

function at(t: CivilTime, hour: number, minute: number, second: number, nanosecond: number): CivilTime {
  return { ...t, hour, minute, second, nanosecond }
}

function startOfDay(t: CivilTime): CivilTime {
  return at(t, 0, 0, 0, 0)
}

function endOfDay(t: CivilTime): CivilTime {
  return at(t, 23, 59, 59, LAST_NANO)
}

/** Monday-based unless another first weekday (0 = Sunday) is given */
function startOfWeek(t: CivilTime, firstWeekday = 1): CivilTime {
  const back = (weekdayOf(t) - firstWeekday + 7) % 7
  return startOfDay(addDays(t, -back))
}

function startOfMonth(t: CivilTime): CivilTime {
  return startOfDay({ ...t, day: 1 })
}

function endOfMonth(t: CivilTime): CivilTime {
  return endOfDay({ ...t, day: daysInMonth(t.year, t.month) })
}

function startOfYear(t: CivilTime): CivilTime {
  return startOfDay({ ...t, month: 1, day: 1 })
}

function endOfYear(t: CivilTime): CivilTime {
  return endOfDay({ ...t, month: 12, day: 31 })
}

/** Round the fraction to `digits` decimal places, carrying into the seconds */
function roundFraction(t: CivilTime, digits = 0): CivilTime {
  if (digits >= 9) return t
  const step = 10 ** (9 - Math.max(0, Math.floor(digits)))
  const rounded = Math.round(t.nanosecond / step) * step
  if (rounded < NANOS_PER_SECOND) return { ...t, nanosecond: rounded }
  return addSeconds({ ...t, nanosecond: 0 }, 1)
}

export const LOCAL_OPERATIONS = {
  // Component queries
  year: (t) => t.year,
  month: (t) => t.month,
  day: (t) => t.day,
  hour: (t) => t.hour,
  minute: (t) => t.minute,
  second: (t) => t.second,
  nanosecond: (t) => t.nanosecond,
  weekday: (t) => weekdayOf(t),
  yearDay: (t) => yearDayOf(t),
  daysInMonth: (t) => daysInMonth(t.year, t.month),
  isWeekend: (t) => weekdayOf(t) === 0 || weekdayOf(t) === 6,

  // Calendar helpers
  beginningOfDay: startOfDay,
  middleOfDay: (t) => at(t, 12, 0, 0, 0),
  endOfDay,
  beginningOfHour: (t) => at(t, t.hour, 0, 0, 0),
  endOfHour: (t) => at(t, t.hour, 59, 59, LAST_NANO),
  beginningOfMinute: (t) => at(t, t.hour, t.minute, 0, 0),
  endOfMinute: (t) => at(t, t.hour, t.minute, 59, LAST_NANO),
  beginningOfWeek: startOfWeek,
  endOfWeek: (t, firstWeekday = 1) => endOfDay(addDays(startOfWeek(t, firstWeekday), 6)),
  beginningOfMonth: startOfMonth,
  endOfMonth,
  beginningOfYear: startOfYear,
  endOfYear,
  tomorrow: (t) => addDays(t, 1),
  yesterday: (t) => addDays(t, -1),
  nextMonth: (t, n = 1) => addMonths(t, n),
  prevMonth: (t, n = 1) => addMonths(t, -n),
  nextYear: (t, n = 1) => addMonths(t, 12 * n),
  prevYear: (t, n = 1) => addMonths(t, -12 * n),
  round: roundFraction,

  // Ranges
  allDay: (t): CivilRange => ({ begin: startOfDay(t), end: endOfDay(t) }),
  allWeek: (t, firstWeekday = 1): CivilRange => {
    const begin = startOfWeek(t, firstWeekday)
    return { begin, end: endOfDay(addDays(begin, 6)) }
  },
  allMonth: (t): CivilRange => ({ begin: startOfMonth(t), end: endOfMonth(t) }),
  allYear: (t): CivilRange => ({ begin: startOfYear(t), end: endOfYear(t) }),
} satisfies Record<string, LocalOperation>

export type LocalOperationName = keyof typeof LOCAL_OPERATIONS

export function isLocalOperationName(name: string): name is LocalOperationName {
  return Object.hasOwn(LOCAL_OPERATIONS, name)
}
