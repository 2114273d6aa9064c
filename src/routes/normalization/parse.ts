import { parse, isValid, getUnixTime } from 'date-fns';

import type { RawPayload } from '../../types';

const NO_DATA_MARKERS = new Set(['ip', 'nan', 'none', 'null', '--', '-', 'n/a', 'na']);

/** Sentinel some stations send instead of leaving a field out. */
const MISSING_VALUE = -9999;

/**
 * Parse a provider value into a number.
 *
 * Accepts numbers and numeric strings with a comma decimal separator, a trailing parenthetical
 * annotation ("37.4(27)" is 37.4 reached on day 27) or a "direction/value" composite ("99/21.1" is 21.1).
 * No-data markers such as "Ip" (inapreciable) or "--" and anything else unparseable give NaN.
 */
export function parseNumber(value: unknown): number {
    if (typeof value === 'number') {
        return Number.isFinite(value) && value !== MISSING_VALUE ? value : NaN;
    }
    if (typeof value !== 'string') {
        return NaN;
    }

    let s = value.trim();
    if (!s || NO_DATA_MARKERS.has(s.toLowerCase())) {
        return NaN;
    }

    s = s.replace(/\s*\([^)]*\)\s*$/, '');
    if (s.includes('/')) {
        s = s.slice(s.lastIndexOf('/') + 1).trim();
    }
    s = s.replace(',', '.');

    if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(s)) {
        return NaN;
    }
    const parsed = Number(s);
    return parsed === MISSING_VALUE ? NaN : parsed;
}

const DATE_PATTERNS = [
    'yyyy-MM-dd HH:mm:ss',
    'yyyy-MM-dd HH:mm',
    'yyyy/MM/dd HH:mm:ss',
    'yyyy/MM/dd HH:mm',
    'dd-MM-yyyy HH:mm:ss',
    'dd-MM-yyyy HH:mm',
    'dd/MM/yyyy HH:mm:ss',
    'dd/MM/yyyy HH:mm'
];

/**
 * Parse a timestamp into Unix epoch seconds.
 *
 * Numbers are epoch seconds (or milliseconds when larger than 1e11). Strings may be ISO 8601 with or
 * without offset or one of the day-first/year-first layouts providers use; a missing zone means UTC.
 * "now" resolves to `now`. Unparseable input gives NaN.
 */
export function parseEpoch(value: unknown, now: number = Date.now() / 1000): number {
    if (typeof value === 'number') {
        if (!Number.isFinite(value) || value <= 0) return NaN;
        return Math.floor(value > 1e11 ? value / 1000 : value);
    }
    if (typeof value !== 'string') {
        return NaN;
    }

    const raw = value.trim();
    if (!raw) return NaN;
    if (raw.toLowerCase() === 'now') return Math.floor(now);
    if (/^\d+(\.\d+)?$/.test(raw)) return parseEpoch(Number(raw), now);

    // WU upload protocol encodes the space as '+' or '%20' when it isn't decoded
    const clean = raw.replace(/%20|(?<=\d{4}-\d{2}-\d{2})\+/g, ' ').replace(/\s*UTC$/i, 'Z');

    const isoMatch = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/i.exec(clean);
    if (isoMatch) {
        let iso = clean.replace(' ', 'T');
        if (!isoMatch[3]) {
            iso += 'Z';
        } else if (/[+-]\d{4}$/.test(iso)) {
            iso = `${iso.slice(0, -2)}:${iso.slice(-2)}`;
        }
        const ms = Date.parse(iso);
        return Number.isNaN(ms) ? NaN : Math.floor(ms / 1000);
    }

    for (const pattern of DATE_PATTERNS) {
        const parsed = parse(`${clean} +00:00`, `${pattern} xxx`, new Date(0));
        if (isValid(parsed)) {
            return getUnixTime(parsed);
        }
    }

    return NaN;
}

function isPresent(value: unknown): boolean {
    return value !== undefined && value !== null && value !== '';
}

export function isRecord(value: unknown): value is RawPayload {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Look up a key case-insensitively; an exact match wins over a case-folded one.
 */
function lookupKey(record: Readonly<Record<string, unknown>>, key: string): unknown {
    if (key in record) {
        return record[key];
    }
    const folded = key.toLowerCase();
    const match = Object.keys(record).find(k => k.toLowerCase() === folded);
    return match === undefined ? undefined : record[match];
}

/**
 * Resolve a dotted path ("metric.temp") case-insensitively.
 */
export function getPath(payload: RawPayload, path: string): unknown {
    let current: unknown = payload;
    for (const segment of path.split('.')) {
        if (!isRecord(current)) {
            return undefined;
        }
        current = lookupKey(current, segment);
    }
    return current;
}

/**
 * Return the value of the first alias that is present and not empty.
 */
export function resolveField(payload: RawPayload, aliases: readonly string[]): unknown {
    for (const alias of aliases) {
        const value = getPath(payload, alias);
        if (isPresent(value)) {
            return value;
        }
    }
    return undefined;
}

/**
 * Return the first alias that resolves to a parseable number, NaN if none does.
 */
export function resolveNumber(payload: RawPayload, aliases: readonly string[]): number {
    for (const alias of aliases) {
        const value = parseNumber(getPath(payload, alias));
        if (!Number.isNaN(value)) {
            return value;
        }
    }
    return NaN;
}
