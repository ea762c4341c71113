export * from './messages.js';
export * from './serialize.js';
