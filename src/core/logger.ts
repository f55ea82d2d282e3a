import { type Logger, pino } from 'pino';
import type { BoardroomConfig } from './config.js';

export function createLogger(cfg: BoardroomConfig): Logger {
  return pino({
    level: cfg.BOARDROOM_LOG_LEVEL,
    redact: {
      paths: ['email', 'user.email'],
      censor: '[redacted]'
    }
  });
}
