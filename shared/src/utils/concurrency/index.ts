export { ReadWriteLock, type ReleaseLock } from './readWriteLock.js';
