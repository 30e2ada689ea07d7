import { pino, type Logger } from 'pino';
import type { LogLevel } from './config.js';

export const createLogger = (level: LogLevel): Logger => pino({ name: 'duetwords', level });
