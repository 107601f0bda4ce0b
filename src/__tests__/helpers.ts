import type { Logger, LogLevel } from '../shared/logger.js';

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
}

export function recordingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    logger: {
      debug: message => entries.push({ level: 'debug', message }),
      info: message => entries.push({ level: 'info', message }),
      warn: message => entries.push({ level: 'warn', message }),
      error: message => entries.push({ level: 'error', message }),
    },
  };
}

export function messagesAt(entries: LogEntry[], level: LogEntry['level']): string[] {
  return entries.filter(e => e.level === level).map(e => e.message);
}
