import { AlertClass, AlertGateConfig, GateDecision } from './types.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('AlertGate');

/**
 * Alert Gate: per-class maintenance suppression and cooldown
 *
 * Checked in order for every candidate alert:
 * 1. SUPPRESSED: maintenance mode is on
 * 2. THROTTLED: the class fired no longer than the cooldown ago
 * 3. FIRE: otherwise
 *
 * Only recordFiring() moves a class's timestamp, so suppressed and throttled
 * alerts never extend the cooldown. A firing is recorded whatever the
 * delivery outcome.
 */
export class AlertGate {
    private lastFired: Map<AlertClass, number> = new Map();

    constructor(private readonly config: AlertGateConfig) { }

    /**
     * Decide what to do with a candidate alert at time `now` (ms)
     */
    public evaluate(alertClass: AlertClass, now: number): GateDecision {
        if (this.config.maintenanceMode) {
            return GateDecision.SUPPRESSED;
        }

        const last = this.lastFired.get(alertClass);
        if (last !== undefined && now - last <= this.config.cooldownMs) {
            return GateDecision.THROTTLED;
        }

        return GateDecision.FIRE;
    }

    /**
     * Record that a class fired at time `at` (ms). Never moves backwards.
     */
    public recordFiring(alertClass: AlertClass, at: number): void {
        const last = this.lastFired.get(alertClass);
        if (last !== undefined && at < last) {
            logger.debug(`Ignoring out-of-order firing for ${alertClass}`);
            return;
        }
        this.lastFired.set(alertClass, at);
    }

    /**
     * Time of the last firing of a class, or null if it never fired
     */
    public lastFiredAt(alertClass: AlertClass): number | null {
        return this.lastFired.get(alertClass) ?? null;
    }

    /**
     * Milliseconds until the class may fire again (0 when it may fire now)
     */
    public cooldownRemaining(alertClass: AlertClass, now: number): number {
        const last = this.lastFired.get(alertClass);
        if (last === undefined) return 0;
        return Math.max(0, last + this.config.cooldownMs - now + 1);
    }
}
