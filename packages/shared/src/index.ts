export * from './deck.js';
export * from './events.js';
export * from './schemas.js';
