import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_TAGS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: pc.dim('debug'),
  info: pc.cyan('info '),
  warn: pc.yellow('warn '),
  error: pc.red('error'),
};

export interface LoggerOptions {
  readonly level: LogLevel;
  /** Line sink, stderr by default so stdout stays clean for reports */
  readonly write?: (line: string) => void;
}

/**
 * Create a levelled logger writing colour-tagged lines.
 * Messages carry model ids, tool names and sizes only, never prompt text.
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = LEVEL_ORDER[options.level];
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    write(`${pc.dim(new Date().toISOString())} ${LEVEL_TAGS[level]} ${message}`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = createLogger({ level: 'silent', write: () => {} });

/** Parse a level name, returning undefined for unknown values */
export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (raw == null) return undefined;
  const normalized = raw.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}
