export { createLogger, createWalletLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export { AuditDb, sanitiseDetails, assertNoSecrets } from './audit.js';
export type { AuditEvent, AuditEventType, AuditRow, QueryOptions } from './audit.js';
