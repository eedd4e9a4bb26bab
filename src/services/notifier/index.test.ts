import { describe, it, expect, vi, afterEach } from 'vitest';
import { SlackNotifier, buildSlackPayload } from './index.js';

const log = vi.hoisted(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
}));

vi.mock('../../utils/logger.js', () => ({
    logger: log,
    createLogger: () => log,
}));

const WEBHOOK = 'https://hooks.example.com/services/test';

describe('buildSlackPayload', () => {
    it('should wrap the alert in a single danger attachment', () => {
        const payload = buildSlackPayload('High Error Rate', 'rate is 60.00%', 1_700_000_000_500);

        expect(payload).toEqual({
            username: 'log-watcher',
            icon_emoji: ':rotating_light:',
            attachments: [
                {
                    fallback: 'High Error Rate - rate is 60.00%',
                    color: 'danger',
                    title: 'High Error Rate',
                    text: 'rate is 60.00%',
                    ts: 1_700_000_000,
                },
            ],
        });
    });
});

describe('SlackNotifier', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
        vi.clearAllMocks();
    });

    it('should post the payload as JSON and report success', async () => {
        const response = new Response('ok', { status: 200 });
        const fetchMock = vi.fn().mockResolvedValue(response);
        vi.stubGlobal('fetch', fetchMock);

        const notifier = new SlackNotifier({ webhookUrl: WEBHOOK, timeoutMs: 1000 });
        const delivered = await notifier.deliver('Failover Detected', 'blue -> green');

        expect(delivered).toBe(true);
        expect(fetchMock).toHaveBeenCalledTimes(1);

        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe(WEBHOOK);
        expect(init.method).toBe('POST');
        expect(init.headers).toEqual({ 'Content-Type': 'application/json' });

        const body = JSON.parse(init.body);
        expect(body.attachments[0].title).toBe('Failover Detected');
        expect(body.attachments[0].text).toBe('blue -> green');
        expect(response.bodyUsed).toBe(true);
    });

    it('should report failure on a non-2xx answer', async () => {
        const response = new Response('invalid_payload', { status: 500 });
        vi.stubGlobal('fetch', vi.fn().mockResolvedValue(response));

        const notifier = new SlackNotifier({ webhookUrl: WEBHOOK, timeoutMs: 1000 });

        await expect(notifier.deliver('t', 'b')).resolves.toBe(false);
        expect(response.bodyUsed).toBe(true);
        expect(log.error).toHaveBeenCalledWith('Failed to send Slack alert "t": HTTP 500: invalid_payload');
    });

    it('should report failure on a network error', async () => {
        vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

        const notifier = new SlackNotifier({ webhookUrl: WEBHOOK, timeoutMs: 1000 });

        await expect(notifier.deliver('t', 'b')).resolves.toBe(false);
    });

    it('should abort a request that outlives the timeout', async () => {
        vi.stubGlobal('fetch', vi.fn((_url: string, init: RequestInit) => new Promise((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })));

        const notifier = new SlackNotifier({ webhookUrl: WEBHOOK, timeoutMs: 20 });

        await expect(notifier.deliver('t', 'b')).resolves.toBe(false);
    });

    it('should skip the network entirely without a webhook', async () => {
        const fetchMock = vi.fn();
        vi.stubGlobal('fetch', fetchMock);

        const notifier = new SlackNotifier({ timeoutMs: 1000 });

        await expect(notifier.deliver('t', 'b')).resolves.toBe(false);
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should log only the title when no webhook is set', async () => {
        const notifier = new SlackNotifier({ timeoutMs: 1000 });

        await notifier.deliver('High Error Rate', 'rate is 60.00%');

        expect(log.warn).toHaveBeenCalledTimes(1);
        expect(log.warn).toHaveBeenCalledWith('SLACK_WEBHOOK_URL not set; alert not delivered: High Error Rate');
    });
});
