import { LOG_FIELD_NAMES, LogFieldName, LogRecord, RECORD_KEYS } from './types.js';

/**
 * One pattern per field, so a missing or reordered field only loses itself.
 *
 * A marker counts at line start or after whitespace. The value is lazy and
 * stops before the next whitespace-separated `identifier:` marker, so it can
 * hold spaces and punctuation (`500, 502`, `10.0.0.1:8080`).
 *
 * The terminator is only tried right after a non-space character, so a long
 * run of whitespace is scanned once rather than once per position.
 */
function fieldPattern(name: string): RegExp {
    return new RegExp(`(?:^|\\s)${name}:(.*?)(?=(?<!\\s)\\s+[A-Za-z_][\\w-]*:|$)`);
}

const FIELD_PATTERNS: ReadonlyArray<[LogFieldName, RegExp]> =
    LOG_FIELD_NAMES.map((name): [LogFieldName, RegExp] => [name, fieldPattern(name)]);

/**
 * Extract the recognised fields from a raw log line.
 * Returns null when the line carries none of them.
 */
export function parseLine(line: string): LogRecord | null {
    const text = line.endsWith('\r') ? line.slice(0, -1) : line;
    const record: LogRecord = {};
    let found = 0;

    for (const [name, pattern] of FIELD_PATTERNS) {
        const match = pattern.exec(text);
        if (!match) continue;

        record[RECORD_KEYS[name]] = (match[1] ?? '').trim();
        found++;
    }

    return found > 0 ? record : null;
}

export * from './types.js';
export { isServerError } from './classifier.js';
