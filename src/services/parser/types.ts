/**
 * `name:` markers recognised in an access log line
 */
export const LOG_FIELD_NAMES = [
    'pool',
    'release',
    'upstream_status',
    'upstream_addr',
    'request_time',
    'upstream_response_time',
] as const;

export type LogFieldName = (typeof LOG_FIELD_NAMES)[number];

/**
 * Fields extracted from one access log line.
 * Only the fields present on the line are set; values are trimmed.
 */
export interface LogRecord {
    /** Backend pool that served the request */
    pool?: string;
    /** Release tag of that pool */
    release?: string;
    /** Upstream status, may list several codes (`502, 200`) */
    upstreamStatus?: string;
    /** Upstream address(es) tried */
    upstreamAddr?: string;
    requestTime?: string;
    upstreamResponseTime?: string;
}

/**
 * LogRecord key filled by each marker
 */
export const RECORD_KEYS: Record<LogFieldName, keyof LogRecord> = {
    pool: 'pool',
    release: 'release',
    upstream_status: 'upstreamStatus',
    upstream_addr: 'upstreamAddr',
    request_time: 'requestTime',
    upstream_response_time: 'upstreamResponseTime',
};
