import pino from 'pino';
import { config } from './config.js';

export const logger = pino({
  name: 'ladder-backtester',
  level: config.log.level,
  transport: {
    target: 'pino/file',
    options: { destination: 2 }, // stderr: 리포트는 stdout
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createChildLogger(module: string) {
  return logger.child({ module });
}
