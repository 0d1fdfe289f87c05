import pino, { type BaseLogger } from 'pino';

export type { BaseLogger };

// Default for callers that do not pass a logger
export const silentLogger: BaseLogger = pino({ level: 'silent' });
