import { createLogger } from '../../utils/logger.js';

const logger = createLogger('Notifier');

/**
 * Delivers one alert to an external channel.
 * Resolves to whether the alert was accepted; never rejects.
 */
export interface Notifier {
    deliver(title: string, body: string): Promise<boolean>;
}

export interface SlackNotifierOptions {
    /** Incoming webhook URL; unset means alerts are only logged */
    webhookUrl?: string;
    /** Request timeout (ms) */
    timeoutMs: number;
}

/**
 * Slack incoming-webhook message with one attachment
 */
export interface SlackPayload {
    username: string;
    icon_emoji: string;
    attachments: Array<{
        fallback: string;
        color: string;
        title: string;
        text: string;
        /** Unix seconds */
        ts: number;
    }>;
}

export function buildSlackPayload(title: string, text: string, now: number = Date.now()): SlackPayload {
    return {
        username: 'log-watcher',
        icon_emoji: ':rotating_light:',
        attachments: [
            {
                fallback: `${title} - ${text}`,
                color: 'danger',
                title,
                text,
                ts: Math.floor(now / 1000),
            },
        ],
    };
}

/**
 * SlackNotifier: posts alerts to a Slack-compatible incoming webhook
 *
 * - Aborts the request after the configured timeout
 * - Network errors, timeouts and non-2xx answers are logged and reported as false
 * - Without a webhook URL nothing is sent and the alert is reported as not
 *   delivered. The caller logs the alert text
 */
export class SlackNotifier implements Notifier {
    constructor(private readonly options: SlackNotifierOptions) { }

    public async deliver(title: string, body: string): Promise<boolean> {
        const { webhookUrl, timeoutMs } = this.options;

        if (!webhookUrl) {
            logger.warn(`SLACK_WEBHOOK_URL not set; alert not delivered: ${title}`);
            return false;
        }

        const payload = buildSlackPayload(title, body);

        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), timeoutMs);

        try {
            const response = await fetch(webhookUrl, {
                method: 'POST',
                signal: controller.signal,
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(payload),
            });

            // Drain the body so the connection is released
            const detail = (await response.text()).trim().slice(0, 200);

            if (!response.ok) {
                throw new Error(`HTTP ${response.status}: ${detail || response.statusText}`);
            }

            logger.info(`Slack alert sent: ${title}`);
            return true;
        } catch (error) {
            const message = controller.signal.aborted
                ? `timed out after ${timeoutMs}ms`
                : error instanceof Error ? error.message : String(error);
            logger.error(`Failed to send Slack alert "${title}": ${message}`);
            return false;
        } finally {
            clearTimeout(timeout);
        }
    }
}
