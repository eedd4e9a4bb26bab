import { AlertClass, FailoverEvent } from '../services/monitor/index.js';
import { LogRecord } from '../services/parser/index.js';

/**
 * An alert ready for delivery
 */
export interface Alert {
    alertClass: AlertClass;
    title: string;
    text: string;
}

export const FAILOVER_TITLE = 'Failover Detected';
export const ERROR_RATE_TITLE = 'High Error Rate';

/** Placeholder for values a log line did not carry */
const MISSING = '-';

export function failoverAlert(event: FailoverEvent, line: string): Alert {
    return {
        alertClass: AlertClass.FAILOVER,
        title: FAILOVER_TITLE,
        text: [
            `Failover detected: ${event.previousPool} -> ${event.currentPool}`,
            `Sample log: ${line}`,
        ].join('\n'),
    };
}

export interface ErrorRateSample {
    rate: number;
    windowSize: number;
    threshold: number;
    /** Record that pushed the rate over the threshold */
    record: LogRecord;
    /** Pool the failover detector is tracking, which may come from an earlier line */
    activePool: string | null;
}

/**
 * The sample line shows the triggering record as logged; the active pool
 * is listed separately since that record may not name a pool at all.
 */
export function errorRateAlert(sample: ErrorRateSample): Alert {
    const { record } = sample;

    return {
        alertClass: AlertClass.ERROR_RATE,
        title: ERROR_RATE_TITLE,
        text: [
            `High upstream 5xx error rate detected: ${sample.rate.toFixed(2)}% over last ${sample.windowSize} requests`,
            `Threshold: ${sample.threshold}%`,
            `Latest sample: pool=${record.pool || MISSING} status=${record.upstreamStatus || MISSING} upstream=${record.upstreamAddr || MISSING}`,
            `Active pool: ${sample.activePool ?? MISSING}`,
        ].join('\n'),
    };
}
