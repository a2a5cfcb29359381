export * from './types/cards.js';
export * from './types/player.js';
export * from './types/game.js';
export * from './types/events.js';
export * from './engine/errors.js';
export * from './engine/events.js';
export * from './engine/deck.js';
export * from './engine/validation.js';
export * from './engine/views.js';
export * from './engine/game.js';
export * from './engine/round.js';
export * from './engine/scoring.js';
export * from './engine/reveal.js';
