import { WatcherConfig } from '../config/index.js';
import { FailoverEvent } from '../services/monitor/index.js';
import { Notifier, SlackNotifier } from '../services/notifier/index.js';
import { tailFile } from '../services/tail/index.js';
import { createLogger } from '../utils/logger.js';
import { WatcherEngine, WatcherStats } from './engine.js';

const logger = createLogger('LogWatcher');

export type LineSource = (signal: AbortSignal) => AsyncIterable<string>;

export interface LogWatcherDeps {
    notifier?: Notifier;
    /** Line source; defaults to tailing config.logPath */
    source?: LineSource;
    clock?: () => number;
}

/**
 * Log Watcher
 *
 * Orchestrates:
 * - SlackNotifier (Delivery)
 * - tailFile (Access log source)
 * - WatcherEngine (Parsing, detection, alert gating)
 */
export class LogWatcher {
    private readonly engine: WatcherEngine;
    private readonly notifier: Notifier;
    private readonly source: LineSource;
    private controller: AbortController | null = null;

    constructor(private readonly config: Readonly<WatcherConfig>, deps: LogWatcherDeps = {}) {
        this.notifier = deps.notifier ?? new SlackNotifier({
            webhookUrl: config.webhookUrl,
            timeoutMs: config.requestTimeoutMs,
        });
        this.source = deps.source ?? ((signal) => tailFile(config.logPath, {
            pollIntervalMs: config.pollIntervalMs,
            waitForFileMs: config.waitForFileMs,
            signal,
        }));
        this.engine = new WatcherEngine(config, this.notifier, deps.clock);

        this.setupEventListeners();
    }

    /**
     * Engine events worth an info line
     */
    private setupEventListeners() {
        this.engine.on('failover:detected', ({ previousPool, currentPool }: FailoverEvent) => {
            logger.info(`Active pool changed: ${previousPool} -> ${currentPool}`);
        });
    }

    /**
     * Run until stop() is called or the source ends
     */
    public async start(): Promise<void> {
        if (this.controller) {
            throw new Error('LogWatcher is already running');
        }

        const { config } = this;
        logger.info(`Starting log watcher. Log path: ${config.logPath}`);
        logger.info(
            `Threshold: ${config.errorRateThreshold}% over ${config.windowSize} requests, `
            + `cooldown ${config.alertCooldownSec}s, maintenance=${config.maintenanceMode}, debug=${config.debug}`
        );
        if (!config.webhookUrl) {
            logger.warn('SLACK_WEBHOOK_URL not set; alerts will only be logged');
        }

        this.controller = new AbortController();
        try {
            await this.engine.run(this.source(this.controller.signal));
        } finally {
            this.controller = null;
        }
    }

    /**
     * Stop following the log and report what was seen
     */
    public stop(): void {
        this.controller?.abort();

        const stats = this.getStats();
        logger.info(
            `Stopped after ${stats.linesSeen} lines (${stats.linesIgnored} ignored); `
            + `alerts fired=${stats.alerts.fire} throttled=${stats.alerts.throttled} suppressed=${stats.alerts.suppressed}`
        );
    }

    public getStats(): WatcherStats {
        return this.engine.getStats();
    }
}

export { WatcherEngine } from './engine.js';
export type { WatcherEvents, WatcherStats, EngineConfig } from './engine.js';
export type { Alert } from './alerts.js';
