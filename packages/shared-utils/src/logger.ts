import { nowIso } from './date.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

function resolveMinLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toUpperCase();
  if (raw === 'DEBUG' || raw === 'INFO' || raw === 'WARN' || raw === 'ERROR') return raw;
  return 'INFO';
}

/**
 * 에러 객체를 JSON 직렬화 가능한 형태로 변환
 * - Error 인스턴스는 message/stack 만 남긴다 (JSON.stringify 시 {} 로 사라지는 문제 방지)
 */
export function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    const out: Record<string, unknown> = { name: error.name, message: error.message, stack: error.stack };
    if (error.cause !== undefined) out.cause = serializeError(error.cause);
    return out;
  }
  return error;
}

export class Logger {
  constructor(private serviceName: string) {}

  private log(level: LogLevel, message: string, data?: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveMinLevel()]) return;

    const entry: LogEntry = {
      level,
      service: this.serviceName,
      message,
      timestamp: nowIso(),
      data,
    };

    const formatted = JSON.stringify(entry, (_key, value: unknown) =>
      value instanceof Error ? serializeError(value) : value,
    );

    switch (level) {
      case 'DEBUG':
      case 'INFO':
        console.log(formatted);
        break;
      case 'WARN':
        console.warn(formatted);
        break;
      case 'ERROR':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, data?: unknown) {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown) {
    this.log('ERROR', message, serializeError(error));
  }
}

export function createLogger(serviceName: string): Logger {
  return new Logger(serviceName);
}
