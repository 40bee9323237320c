/**
 * @davgate/shared
 *
 * Configuration, logging, error types, the credential store and usage
 * providers shared by the server and the CLI.
 */

export * from './config/index.js';
export * from './utils/index.js';
export { AService } from './services/abstracts/AService.js';
export * from './users/index.js';
export * from './storage/index.js';
