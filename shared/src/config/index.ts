export * from './constants.js';
export * from './env.js';
export * from './quota.js';
export * from './serverConfig.js';
