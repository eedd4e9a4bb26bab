import { EventEmitter } from 'events';
import {
    AlertClass,
    AlertGate,
    ErrorWindow,
    FailoverDetector,
    FailoverEvent,
    GateDecision,
} from '../services/monitor/index.js';
import { isServerError, parseLine } from '../services/parser/index.js';
import { Notifier } from '../services/notifier/index.js';
import { WatcherConfig } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import { Alert, errorRateAlert, failoverAlert } from './alerts.js';

const logger = createLogger('Engine');

/**
 * Engine event payloads
 */
export interface WatcherEvents {
    'line:ignored': { line: string };
    'failover:detected': FailoverEvent;
    'alert:fired': { alert: Alert; delivered: boolean };
    'alert:suppressed': { alert: Alert };
    'alert:throttled': { alert: Alert; retryInMs: number };
}

export interface WatcherStats {
    linesSeen: number;
    linesParsed: number;
    linesIgnored: number;
    activePool: string | null;
    windowSize: number;
    /** Current error percentage, null while the window is empty */
    errorRate: number | null;
    alerts: Record<GateDecision, number>;
}

export type EngineConfig = Pick<
    WatcherConfig,
    'errorRateThreshold' | 'windowSize' | 'alertCooldownSec' | 'maintenanceMode'
>;

/**
 * Watcher Engine: turns access log lines into gated alerts
 *
 * Per line:
 * 1. Parse; lines without a recognised field are ignored
 * 2. Feed the pool to the failover detector, raising a failover alert on change
 * 3. If the line carries an upstream status, record it in the error window and
 *    raise an error-rate alert while the rate is above the threshold
 *
 * Every alert goes through the gate; only FIRE reaches the notifier. All state
 * is private to one engine and lines are handled strictly one at a time.
 */
export class WatcherEngine extends EventEmitter {
    private readonly window: ErrorWindow;
    private readonly failover = new FailoverDetector();
    private readonly gate: AlertGate;
    private linesSeen = 0;
    private linesParsed = 0;
    private alertCounts: Record<GateDecision, number> = {
        [GateDecision.FIRE]: 0,
        [GateDecision.THROTTLED]: 0,
        [GateDecision.SUPPRESSED]: 0,
    };

    constructor(
        private readonly config: EngineConfig,
        private readonly notifier: Notifier,
        private readonly clock: () => number = Date.now
    ) {
        super();
        this.window = new ErrorWindow(config.windowSize);
        this.gate = new AlertGate({
            maintenanceMode: config.maintenanceMode,
            cooldownMs: config.alertCooldownSec * 1000,
        });
    }

    /**
     * Consume lines until the source ends
     */
    public async run(lines: AsyncIterable<string>): Promise<void> {
        for await (const line of lines) {
            await this.processLine(line);
        }
    }

    /**
     * Advance every detector with one raw log line
     */
    public async processLine(line: string): Promise<void> {
        this.linesSeen++;

        const record = parseLine(line);
        if (!record) {
            logger.debug(`Ignoring unrecognised line: ${line}`);
            this.publish('line:ignored', { line });
            return;
        }
        this.linesParsed++;

        const change = this.failover.observe(record.pool);
        if (change) {
            this.publish('failover:detected', change);
            await this.raise(failoverAlert(change, line));
        }

        const status = record.upstreamStatus?.trim();
        if (!status) return;

        const isError = isServerError(status);
        this.window.observe(isError);
        logger.debug(`Window append: status=${status} error=${isError} size=${this.window.size}`);

        const rate = this.window.currentRate();
        if (rate !== null && rate > this.config.errorRateThreshold) {
            await this.raise(errorRateAlert({
                rate,
                windowSize: this.window.size,
                threshold: this.config.errorRateThreshold,
                record,
                activePool: this.failover.activePool,
            }));
        }
    }

    /**
     * Snapshot of counters and detector state
     */
    public getStats(): WatcherStats {
        return {
            linesSeen: this.linesSeen,
            linesParsed: this.linesParsed,
            linesIgnored: this.linesSeen - this.linesParsed,
            activePool: this.failover.activePool,
            windowSize: this.window.size,
            errorRate: this.window.currentRate(),
            alerts: { ...this.alertCounts },
        };
    }

    /**
     * Gate an alert and deliver it when allowed
     */
    private async raise(alert: Alert): Promise<GateDecision> {
        const now = this.clock();
        const decision = this.gate.evaluate(alert.alertClass, now);
        this.alertCounts[decision]++;

        switch (decision) {
            case GateDecision.SUPPRESSED:
                logger.info(`Maintenance mode ON: suppressing ${this.describe(alert.alertClass)} alert`);
                this.publish('alert:suppressed', { alert });
                break;

            case GateDecision.THROTTLED: {
                const retryInMs = this.gate.cooldownRemaining(alert.alertClass, now);
                logger.info(`${this.describe(alert.alertClass)} alert in cooldown for another ${Math.ceil(retryInMs / 1000)}s; skipping`);
                this.publish('alert:throttled', { alert, retryInMs });
                break;
            }

            case GateDecision.FIRE: {
                const delivered = await this.deliver(alert);
                this.gate.recordFiring(alert.alertClass, now);
                this.publish('alert:fired', { alert, delivered });
                break;
            }
        }

        return decision;
    }

    /**
     * Hand an alert to the notifier. A throwing notifier counts as a failed delivery.
     */
    private async deliver(alert: Alert): Promise<boolean> {
        logger.warn(`${alert.title}: ${alert.text}`);
        try {
            return await this.notifier.deliver(alert.title, alert.text);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`Notifier failed for ${alert.title}: ${message}`);
            return false;
        }
    }

    private publish<K extends keyof WatcherEvents>(event: K, payload: WatcherEvents[K]): void {
        this.emit(event, payload);
    }

    private describe(alertClass: AlertClass): string {
        return alertClass === AlertClass.FAILOVER ? 'Failover' : 'Error-rate';
    }
}
