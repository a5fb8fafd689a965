export * from './graph.js';
export * from './raw.js';
