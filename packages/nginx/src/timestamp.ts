/**
 * `$time_local` timestamps: `17/May/2015:08:05:32 +0000`
 *
 * The text is parsed with combinators, then range-checked and converted to a
 * UTC instant.
 */

import {
  alt,
  char,
  isDigit,
  map,
  optional,
  preceded,
  runParser,
  satisfy,
  seq,
  value,
  literal,
  type Converted,
  type Parser,
} from "@parsnip/parser";

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

const EXPECTED_FORMAT = "timestamp like 17/May/2015:08:05:32 +0000";

interface TimestampFields {
  day: number;
  /** 0-based */
  month: number;
  year: number;
  hour: number;
  minute: number;
  second: number;
  /** +1 east of UTC, -1 west */
  offsetSign: OffsetSign;
  offsetHours: number;
  offsetMinutes: number;
}

const digit = satisfy(isDigit, "digit");

function fixedDigits(count: number): Parser<number> {
  return map(seq(...Array.from({ length: count }, () => digit)), (ds) => Number(ds.join("")));
}

const twoDigits = fixedDigits(2);

const day = map(seq(digit, optional(digit)), ([tens, units]) => Number(tens + (units ?? "")));

const month = alt(...MONTHS.map((name, index) => value(literal(name), index)));

type OffsetSign = 1 | -1;

const EAST: OffsetSign = 1;
const WEST: OffsetSign = -1;

const sign = alt<OffsetSign>(value(char("+"), EAST), value(char("-"), WEST));

const timestampText: Parser<TimestampFields> = map(
  seq(
    day,
    preceded(char("/"), month),
    preceded(char("/"), fixedDigits(4)),
    preceded(char(":"), twoDigits),
    preceded(char(":"), twoDigits),
    preceded(char(":"), twoDigits),
    preceded(char(" "), seq(sign, twoDigits, twoDigits))
  ),
  ([d, m, year, hour, minute, second, [offsetSign, offsetHours, offsetMinutes]]) => ({
    day: d,
    month: m,
    year,
    hour,
    minute,
    second,
    offsetSign,
    offsetHours,
    offsetMinutes,
  })
);

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return [31, leap ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31][month];
}

function rangeError(fields: TimestampFields): string | undefined {
  if (fields.day < 1 || fields.day > daysInMonth(fields.year, fields.month)) {
    return `day of ${MONTHS[fields.month]} ${fields.year}`;
  }
  if (fields.hour > 23) return "hour between 00 and 23";
  if (fields.minute > 59) return "minute between 00 and 59";
  if (fields.second > 59) return "second between 00 and 59";
  if (fields.offsetHours > 23) return "zone offset hours between 00 and 23";
  if (fields.offsetMinutes > 59) return "zone offset minutes between 00 and 59";
  return undefined;
}

/**
 * Convert `day/Mon/year:hh:mm:ss ±hhmm` to a `Date`. The whole text must
 * match; the date must exist and every time component must be in range.
 */
export function parseTimestampText(text: string): Converted<Date> {
  const outcome = runParser(timestampText, text);
  if (!outcome.ok) return { ok: false, expected: EXPECTED_FORMAT };

  const fields = outcome.value;
  const problem = rangeError(fields);
  if (problem !== undefined) return { ok: false, expected: problem };

  // setUTCFullYear keeps years below 100 as written
  const date = new Date(0);
  date.setUTCFullYear(fields.year, fields.month, fields.day);
  date.setUTCHours(fields.hour, fields.minute, fields.second, 0);
  const offsetMs = fields.offsetSign * (fields.offsetHours * 60 + fields.offsetMinutes) * 60_000;
  return { ok: true, value: new Date(date.getTime() - offsetMs) };
}
