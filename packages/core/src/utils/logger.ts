export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger with `scope` appended to this logger's scope. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Where formatted lines go. Defaults to stderr so stdout stays clean for CLI output. */
  sink?: (line: string) => void;
}

function formatContext(context: LogContext | undefined): string {
  if (!context || Object.keys(context).length === 0) {
    return '';
  }
  try {
    return ` ${JSON.stringify(context)}`;
  } catch {
    return ' [unserializable context]';
  }
}

class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(
    private readonly scope: string,
    private readonly level: LogLevel,
    private readonly sink: (line: string) => void,
  ) {
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(`${this.scope}:${scope}`, this.level, this.sink);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < this.threshold) {
      return;
    }
    this.sink(`[${this.scope}] ${level}: ${message}${formatContext(context)}`);
  }
}

export function createLogger(scope = 'fusekit', options: LoggerOptions = {}): Logger {
  // eslint-disable-next-line no-console
  const sink = options.sink ?? ((line: string) => console.error(line));
  return new ConsoleLogger(scope, options.level ?? 'warn', sink);
}

export const silentLogger: Logger = createLogger('fusekit', { level: 'silent' });

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
