import { resolveLogLevel, type LogLevel } from '@/lib/config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogContext {
  actorId?: string;
  entityId?: string;
  metadata?: Record<string, unknown>;
  error?: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

function serializeContext(context?: LogContext): string {
  if (!context) return '';
  const { error, ...rest } = context;
  const payload: Record<string, unknown> = { ...rest };
  if (error instanceof Error) {
    payload.error = { name: error.name, message: error.message };
  } else if (error !== undefined) {
    payload.error = String(error);
  }
  return ` ${JSON.stringify(payload)}`;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevel
  ) {}

  private write(level: LogLevel, message: string, context?: LogContext) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.scope}] ${message}${serializeContext(context)}`;
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        if (context?.error instanceof Error && context.error.stack) {
          console.error(context.error.stack);
        }
        break;
    }
  }

  debug(message: string, context?: LogContext) {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext) {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext) {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext) {
    this.write('error', message, context);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(`${this.scope}:${scope}`, this.level);
  }
}

export function createLogger(scope: string, level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)): Logger {
  return new ConsoleLogger(scope, level);
}
