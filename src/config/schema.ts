import { z } from 'zod';

const TRUTHY = ['1', 'true', 'yes'];

/**
 * Environment flag: `1`, `true` or `yes` (any case) mean true, anything else false
 */
const envFlag = z.preprocess(
    (value) => typeof value === 'string' ? TRUTHY.includes(value.trim().toLowerCase()) : value,
    z.boolean()
);

/**
 * Schema for the watcher configuration
 */
export const WatcherConfigSchema = z.object({
    /** Access log to tail */
    logPath: z.string().min(1).default('/var/log/nginx/access.log'),
    /** Incoming webhook for alerts; unset means alerts are only logged */
    webhookUrl: z.string().url().optional(),
    /** Upstream 5xx percentage that must be exceeded to alert */
    errorRateThreshold: z.coerce.number().finite().min(0).default(2),
    /** Number of recent requests in the error-rate window */
    windowSize: z.coerce.number().int().min(1).default(200),
    /** Minimum seconds between two alerts of the same class */
    alertCooldownSec: z.coerce.number().finite().min(0).default(300),
    /** Suppress every alert while planned work is in progress */
    maintenanceMode: envFlag.default(false),
    /** Verbose logging of ignored lines and window updates */
    debug: envFlag.default(false),
    /** Webhook request timeout (ms) */
    requestTimeoutMs: z.coerce.number().int().min(100).default(5000),
    /** Delay before re-reading the log when no new data arrived (ms) */
    pollIntervalMs: z.coerce.number().int().min(10).default(200),
    /** Delay between checks while the log file does not exist yet (ms) */
    waitForFileMs: z.coerce.number().int().min(10).default(500),
});

export type WatcherConfig = z.infer<typeof WatcherConfigSchema>;

export type ConfigKey = keyof WatcherConfig;

/**
 * Environment variable backing each configuration field
 */
export const ENV_KEYS: Record<ConfigKey, string> = {
    logPath: 'NGINX_LOG_PATH',
    webhookUrl: 'SLACK_WEBHOOK_URL',
    errorRateThreshold: 'ERROR_RATE_THRESHOLD',
    windowSize: 'WINDOW_SIZE',
    alertCooldownSec: 'ALERT_COOLDOWN_SEC',
    maintenanceMode: 'MAINTENANCE_MODE',
    debug: 'WATCHER_DEBUG',
    requestTimeoutMs: 'ALERT_TIMEOUT_MS',
    pollIntervalMs: 'POLL_INTERVAL_MS',
    waitForFileMs: 'WAIT_FOR_FILE_MS',
};

/**
 * Configuration used when the environment sets nothing
 */
export const DEFAULT_CONFIG: WatcherConfig = WatcherConfigSchema.parse({});
