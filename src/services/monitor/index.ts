export * from './types.js';
export { ErrorWindow } from './error-window.js';
export { FailoverDetector } from './failover-detector.js';
export { AlertGate } from './alert-gate.js';
