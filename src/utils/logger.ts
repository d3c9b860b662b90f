/**
 * Logger utility using pino.
 * --verbose raises every logger, including ones created at import time.
 * Under the test runner loggers are silent and start no transport thread.
 */
import pino from 'pino';

const isTestRun = process.env.VITEST !== undefined || process.env.NODE_ENV === 'test';

let globalLevel: pino.LevelWithSilent = isTestRun ? 'silent' : 'info';
const loggers: pino.Logger[] = [];

export function setLogLevel(level: pino.LevelWithSilent): void {
  globalLevel = level;
  for (const logger of loggers) {
    logger.level = level;
  }
}

export function getLogLevel(): pino.LevelWithSilent {
  return globalLevel;
}

export function createLogger(name: string): pino.Logger {
  const logger = isTestRun
    ? pino({ name, level: globalLevel })
    : pino({
        name,
        level: globalLevel,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2, // stderr, keeps stdout for the game transcript
          },
        },
      });
  loggers.push(logger);
  return logger;
}

export function enableVerbose(): void {
  setLogLevel('debug');
}
