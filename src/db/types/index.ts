export * from './modifier.js';
export * from './reward.js';
