export * from './primitives.js';
export * from './participant.js';
export * from './usage-event.js';
export * from './settlement.js';
