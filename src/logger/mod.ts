export { type CommandLogEntry, Logger } from './logger.js';
