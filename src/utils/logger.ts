// Utility: Structured logger
// One JSON line per event, tagged with the component that emitted it

export interface LogContext {
  [key: string]: string | number | boolean | null | undefined;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevelName(value: string): value is keyof typeof LEVEL_ORDER {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveThreshold(env: NodeJS.ProcessEnv = process.env): number {
  const configured = env.LOG_LEVEL?.toLowerCase();
  if (configured && isLevelName(configured)) {
    return LEVEL_ORDER[configured];
  }
  return env.NODE_ENV === 'production' ? LEVEL_ORDER.info : LEVEL_ORDER.debug;
}

/**
 * Simple structured logger
 */
export class Logger {
  private readonly threshold: number;

  constructor(
    private readonly component: string,
    threshold?: number
  ) {
    this.threshold = threshold ?? resolveThreshold();
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < this.threshold) {
      return;
    }

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...context,
    };

    const line = JSON.stringify(logEntry);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  /**
   * Derive a logger for a sub-component, e.g. `Auth:Mailer`
   */
  child(component: string): Logger {
    return new Logger(`${this.component}:${component}`, this.threshold);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const authLogger = new Logger('Auth');
export const contactsLogger = new Logger('Contacts');
export const mailLogger = new Logger('Mail');
export const serverLogger = new Logger('Server');
