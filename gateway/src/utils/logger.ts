/**
 * Logger - JSON структурированное логирование для Gateway
 */

export type LogLevel = 'info' | 'error' | 'warn';

export type LogData = Record<string, unknown>;

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  service: string;
  event: string;
  data?: LogData;
  error?: string;
}

export class Logger {
  private service: string;

  constructor(service: string = 'gateway') {
    this.service = service;
  }

  log(level: LogLevel, event: string, data?: LogData, error?: string): void {
    const logEntry: LogEntry = {
      timestamp: Date.now(),
      level,
      service: this.service,
      event,
      ...(data && { data }),
      ...(error && { error }),
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }

  info(event: string, data?: LogData): void {
    this.log('info', event, data);
  }

  error(event: string, error: string | Error, data?: LogData): void {
    const errorMsg = error instanceof Error ? error.message : error;
    this.log('error', event, data, errorMsg);
  }

  warn(event: string, data?: LogData): void {
    this.log('warn', event, data);
  }
}

export default Logger;
