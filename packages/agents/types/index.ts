export * from './session.js';
export * from './analysis.js';
export * from './collaborators.js';
export * from './events.js';
