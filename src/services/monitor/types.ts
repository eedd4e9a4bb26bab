/**
 * Alert classes, each gated independently
 */
export enum AlertClass {
    FAILOVER = 'failover',
    ERROR_RATE = 'errorRate',
}

/**
 * Outcome of asking the gate whether an alert may go out
 */
export enum GateDecision {
    /** Maintenance mode: log only */
    SUPPRESSED = 'suppressed',
    /** Same class fired within the cooldown: log only */
    THROTTLED = 'throttled',
    /** Deliver, then record the firing */
    FIRE = 'fire',
}

/**
 * Failover detector states
 */
export enum FailoverState {
    /** No pool seen yet */
    UNINITIALIZED = 'uninitialized',
    /** Tracking the active pool */
    TRACKING = 'tracking',
}

/**
 * A change of active pool
 */
export interface FailoverEvent {
    previousPool: string;
    currentPool: string;
}

/**
 * Alert gate configuration
 */
export interface AlertGateConfig {
    /** Suppress every alert */
    maintenanceMode: boolean;
    /** Minimum time between two firings of one class (ms) */
    cooldownMs: number;
}
