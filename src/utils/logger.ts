import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_TAGS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.cyan('INFO'),
  warn: chalk.yellow('WARN'),
  error: chalk.red('ERROR'),
};

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
}

/**
 * Level-filtered logger. Everything goes to stderr so stdout stays free for
 * command output and the MCP stdio transport.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'warn'];
  const scope = options.scope ? chalk.dim(`[${options.scope}]`) + ' ' : '';

  const write = (level: Exclude<LogLevel, 'silent'>) =>
    (message: string, ...details: unknown[]): void => {
      if (LEVEL_ORDER[level] < threshold) return;
      console.error(`${LEVEL_TAGS[level]} ${scope}${message}`, ...details);
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
