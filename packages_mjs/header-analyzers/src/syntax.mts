/**
 * Shared grammar helpers for field values (RFC 9110 §5.5, §5.6)
 */

import { HeaderSyntaxError } from './errors.mjs';

export const TOKEN_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const QDTEXT_OR_PAIR_RE = /^"(?:[\t !#-[\]-~\x80-\xff]|\\[\t -~\x80-\xff])*"$/;
const DIGITS_RE = /^\d+$/;
const CTL_RE = /[\x00-\x08\x0a-\x1f\x7f]/;
const OBS_TEXT_RE = /[\x80-\xff]/;

/**
 * Largest delta-seconds value a recipient must handle (RFC 9111 §1.2.2)
 */
export const DELTA_SECONDS_MAX = 2147483648;

export function isToken(value: string): boolean {
  return TOKEN_RE.test(value);
}

export function isQuotedString(value: string): boolean {
  return QDTEXT_OR_PAIR_RE.test(value);
}

/**
 * Remove surrounding quotes and quoted-pair escapes.
 * Values that are not quoted are returned unchanged.
 */
export function unquote(value: string): string {
  if (!value.startsWith('"')) return value;
  if (!isQuotedString(value)) {
    throw new HeaderSyntaxError(`Malformed quoted-string: ${value}`, value);
  }
  return value.slice(1, -1).replace(/\\(.)/g, '$1');
}

/**
 * Split on a delimiter, ignoring delimiters inside quoted strings.
 * Elements are trimmed; empty elements are dropped.
 */
export function splitOutsideQuotes(value: string, delimiter: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (inQuotes) {
      current += ch;
      if (ch === '\\' && i + 1 < value.length) {
        current += value[++i];
      } else if (ch === '"') {
        inQuotes = false;
      }
    } else if (ch === '"') {
      inQuotes = true;
      current += ch;
    } else if (ch === delimiter) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);

  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

/**
 * Split a list-based field value on commas (RFC 9110 §5.6.1)
 */
export function splitList(value: string): string[] {
  return splitOutsideQuotes(value, ',');
}

/**
 * A name[=value] pair, as used by parameters and directives
 */
export interface NameValue {
  /** Lower-cased name */
  name: string;
  /** Unquoted value, or null when no "=" was given */
  value: string | null;
  /** The value was sent as a quoted-string */
  quoted: boolean;
}

/**
 * Parse `name[=value]`, where value is a token or quoted-string
 */
export function parseNameValue(part: string): NameValue {
  const eq = part.indexOf('=');
  const name = (eq === -1 ? part : part.substring(0, eq)).trim();
  if (!isToken(name)) {
    throw new HeaderSyntaxError(`Invalid name: "${name}"`, part);
  }
  if (eq === -1) {
    return { name: name.toLowerCase(), value: null, quoted: false };
  }

  const raw = part.substring(eq + 1).trim();
  if (raw.startsWith('"')) {
    return { name: name.toLowerCase(), value: unquote(raw), quoted: true };
  }
  if (!isToken(raw)) {
    throw new HeaderSyntaxError(`Invalid value for ${name}: "${raw}"`, part);
  }
  return { name: name.toLowerCase(), value: raw, quoted: false };
}

/**
 * Parse `;`-separated parameters into a record of lower-cased names
 */
export function parseParameters(parts: readonly string[]): Record<string, string> {
  const params: Record<string, string> = {};
  for (const part of parts) {
    const { name, value } = parseNameValue(part);
    if (value === null) {
      throw new HeaderSyntaxError(`Parameter ${name} has no value`, part);
    }
    params[name] = value;
  }
  return params;
}

/**
 * Parse delta-seconds (1*DIGIT); returns undefined when not all digits.
 * Values beyond 2^31 are clamped to 2^31.
 */
export function parseDeltaSeconds(value: string): number | undefined {
  if (!DIGITS_RE.test(value)) return undefined;
  const n = parseInt(value, 10);
  return Math.min(n, DELTA_SECONDS_MAX);
}

/**
 * Whether the value contains control characters other than HTAB
 */
export function hasControlChars(value: string): boolean {
  return CTL_RE.test(value);
}

/**
 * Whether the value contains bytes outside US-ASCII (obs-text)
 */
export function hasObsText(value: string): boolean {
  return OBS_TEXT_RE.test(value);
}

// --- HTTP-date (RFC 9110 §5.6.7) ---

export type HttpDateFormat = 'imf-fixdate' | 'rfc850' | 'asctime';

export interface HttpDate {
  /** Seconds since the epoch */
  time: number;
  format: HttpDateFormat;
}

const DAY = '(Mon|Tue|Wed|Thu|Fri|Sat|Sun)';
const DAY_LONG = '(Monday|Tuesday|Wednesday|Thursday|Friday|Saturday|Sunday)';
const MONTH = '(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)';
const TIME = '(\\d{2}):(\\d{2}):(\\d{2})';
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const IMF_FIXDATE_RE = new RegExp(`^${DAY}, (\\d{2}) ${MONTH} (\\d{4}) ${TIME} GMT$`);
const RFC850_RE = new RegExp(`^${DAY_LONG}, (\\d{2})-${MONTH}-(\\d{2}) ${TIME} GMT$`);
const ASCTIME_RE = new RegExp(`^${DAY} ${MONTH} ( \\d|\\d{2}) ${TIME} (\\d{4})$`);

function toEpoch(
  year: number,
  month: string,
  day: number,
  hour: number,
  minute: number,
  second: number
): number | undefined {
  const monthIndex = MONTHS.indexOf(month);
  if (hour > 23 || minute > 59 || second > 60 || day < 1) return undefined;
  const ms = Date.UTC(year, monthIndex, day, hour, minute, Math.min(second, 59));
  // reject dates like 31 Feb that Date.UTC would roll over
  if (new Date(ms).getUTCDate() !== day) return undefined;
  return Math.floor(ms / 1000);
}

/**
 * Parse an HTTP-date in any of the three allowed formats
 */
export function parseHttpDate(value: string): HttpDate | undefined {
  let match = IMF_FIXDATE_RE.exec(value);
  if (match) {
    const time = toEpoch(+match[4], match[3], +match[2], +match[5], +match[6], +match[7]);
    return time === undefined ? undefined : { time, format: 'imf-fixdate' };
  }

  match = RFC850_RE.exec(value);
  if (match) {
    const yy = +match[4];
    const year = yy < 70 ? 2000 + yy : 1900 + yy;
    const time = toEpoch(year, match[3], +match[2], +match[5], +match[6], +match[7]);
    return time === undefined ? undefined : { time, format: 'rfc850' };
  }

  match = ASCTIME_RE.exec(value);
  if (match) {
    const time = toEpoch(+match[7], match[2], +match[3].trim(), +match[4], +match[5], +match[6]);
    return time === undefined ? undefined : { time, format: 'asctime' };
  }

  return undefined;
}

/**
 * Format epoch seconds as an IMF-fixdate
 */
export function formatHttpDate(time: number): string {
  return new Date(time * 1000).toUTCString();
}
