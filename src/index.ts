/**
 * sesame
 *
 * Resumable candidate search for recovering the password of an encrypted
 * document: candidate generation, a durable checkpoint ledger, pluggable
 * verifiers and the verification loop that ties them together.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './generation/index.js';
export * from './ledger/index.js';
export * from './verifier/index.js';
export * from './recovery/index.js';
export * from './config/index.js';
export { Logger, type LogEntry, type LogLevel, type LoggerOptions } from './utils/logger.js';
