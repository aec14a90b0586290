// source/handler/conditional.ts
// Evaluation of If-Match, If-Unmodified-Since, If-None-Match and
// If-Modified-Since against the validators of a resolved entity.

import type {
  ConditionalOutcome,
  RequestHeaders,
  Validators,
} from '../types.js';

const MONTHS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
];

const month = MONTHS.join('|');

// IMF-fixdate, RFC 850 and asctime, the three forms recipients must accept.
const httpDateFormats = [
  new RegExp(
    `^(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun), (?<day>\\d{2}) (?<month>${month}) (?<year>\\d{4}) (?<hour>\\d{2}):(?<minute>\\d{2}):(?<second>\\d{2}) GMT$`,
  ),
  new RegExp(
    `^(?:Monday|Tuesday|Wednesday|Thursday|Friday|Saturday|Sunday), (?<day>\\d{2})-(?<month>${month})-(?<year>\\d{2}) (?<hour>\\d{2}):(?<minute>\\d{2}):(?<second>\\d{2}) GMT$`,
  ),
  new RegExp(
    `^(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun) (?<month>${month}) (?<day>[ \\d]\\d) (?<hour>\\d{2}):(?<minute>\\d{2}):(?<second>\\d{2}) (?<year>\\d{4})$`,
  ),
];

/**
 * Parses an HTTP-date into whole seconds since the epoch. Returns `undefined`
 * for anything that is not one of the three HTTP-date forms or names a
 * calendar date that does not exist.
 */
export const parseHttpDate = (value: string | undefined): number | undefined => {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  let groups: Record<string, string> | undefined;

  for (const format of httpDateFormats) {
    groups = format.exec(trimmed)?.groups;
    if (groups) break;
  }

  if (!groups) {
    return undefined;
  }

  const { year, month: monthName, day, hour, minute, second } = groups;

  if (
    year === undefined ||
    monthName === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return undefined;
  }

  let fullYear = Number(year);
  if (year.length === 2) {
    fullYear += fullYear < 70 ? 2000 : 1900;
  }

  const date = Number(day.trim());
  const hours = Number(hour);
  const minutes = Number(minute);
  const seconds = Number(second);

  if (hours > 23 || minutes > 59 || seconds > 60) {
    return undefined;
  }

  const monthIndex = MONTHS.indexOf(monthName);
  const ms = Date.UTC(
    fullYear,
    monthIndex,
    date,
    hours,
    minutes,
    Math.min(seconds, 59),
  );

  // Date.UTC rolls 31 Feb over into March.
  if (new Date(ms).getUTCDate() !== date) {
    return undefined;
  }

  return ms / 1000;
};

/** Joins repeated headers and treats blank ones as missing. */
export const headerValue = (
  headers: RequestHeaders,
  name: string,
): string | undefined => {
  let value = headers[name];

  if (value === undefined) {
    const key = Object.keys(headers).find((k) => k.toLowerCase() === name);
    value = key === undefined ? undefined : headers[key];
  }

  const joined = Array.isArray(value) ? value.join(', ') : value;

  return joined === undefined || joined.trim() === '' ? undefined : joined;
};

const tagPattern = /\*|(?:W\/)?"[^"]*"|[^,\s]+/g;

/** Splits an entity-tag list; commas inside quoted tags are kept. */
export const parseETagList = (value: string): string[] =>
  value.match(tagPattern) ?? [];

const opaque = (tag: string): string =>
  tag.startsWith('W/') ? tag.slice(2) : tag;

/** Weak comparison: `W/"x"` and `"x"` are the same tag. */
export const matchesETag = (tags: string[], etag: string): boolean =>
  tags.some((tag) => tag === '*' || opaque(tag) === opaque(etag));

/**
 * Decides whether the request gets the full representation.
 *
 * If-Match is checked first and, when absent, If-Unmodified-Since. Then
 * If-None-Match, and when no tag matches, If-Modified-Since.
 * Dates compare at whole seconds; unparseable dates count as absent.
 */
export const evaluate = (
  headers: RequestHeaders,
  validators: Validators,
): ConditionalOutcome => {
  const lastModified = Math.floor(validators.lastModified.getTime() / 1000);

  const ifMatch = headerValue(headers, 'if-match');
  if (ifMatch !== undefined) {
    if (!matchesETag(parseETagList(ifMatch), validators.etag)) {
      return 'precondition-failed';
    }
  } else {
    const unmodifiedSince = parseHttpDate(
      headerValue(headers, 'if-unmodified-since'),
    );
    if (unmodifiedSince !== undefined && lastModified > unmodifiedSince) {
      return 'precondition-failed';
    }
  }

  const ifNoneMatch = headerValue(headers, 'if-none-match');
  if (
    ifNoneMatch !== undefined &&
    matchesETag(parseETagList(ifNoneMatch), validators.etag)
  ) {
    return 'not-modified';
  }

  const modifiedSince = parseHttpDate(headerValue(headers, 'if-modified-since'));
  if (modifiedSince !== undefined && modifiedSince >= lastModified) {
    return 'not-modified';
  }

  return 'full';
};
