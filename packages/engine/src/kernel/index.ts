export * from './branded.js';
export * from './game-phase.js';
export * from './game-state-port.js';
export * from './grid-point.js';
export * from './hand-stack.js';
export * from './move-candidate.js';
export * from './move-card.js';
export * from './move-resolution.js';
