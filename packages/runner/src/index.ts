export * from './animation/animation-coordinator.js';
export * from './animation/animation-session.js';
export * from './bridge/reactive-state-bridge.js';
export * from './bridge/signal-bus.js';
export * from './config/coordinator-config.js';
export * from './errors/coordinator-error.js';
export * from './guide/classify-move-candidates.js';
export * from './guide/guide-highlight-buckets.js';
export * from './guide/guide-highlight-engine.js';
export * from './input/board-tap-resolver.js';
export * from './logging/coordinator-logger.js';
export * from './logging/diagnostic-buffer.js';
export * from './store/board-view-store.js';
export * from './surface/rendering-surface.js';
export * from './timer/session-clock.js';
export * from './timer/timer-suspension-coordinator.js';
export * from './utils/scheduler.js';
export * from './warning/conflict-warning-channel.js';
