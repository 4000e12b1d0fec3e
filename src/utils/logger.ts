import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors, splat } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'http' | 'debug';

// Color definitions for different log levels
const levelColors: Record<LevelName, typeof chalk.red> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  http: chalk.magenta,
  debug: chalk.cyan,
};

const levelIcons: Record<LevelName, string> = {
  error: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
  http: '🌐',
  debug: '🔍',
};

const isLevelName = (level: string): level is LevelName => level in levelColors;

// Keys winston adds itself; everything else is caller-supplied context
const RESERVED_KEYS = new Set(['level', 'message', 'timestamp', 'stack', 'service', 'scope']);

const renderContext = (info: winston.Logform.TransformableInfo): string => {
  const context = Object.fromEntries(
    Object.entries(info).filter(([key]) => !RESERVED_KEYS.has(key))
  );
  if (Object.keys(context).length === 0) return '';
  return ` ${JSON.stringify(context, (_key, value: unknown) =>
    value instanceof Error ? value.message : value
  )}`;
};

// Custom colorized format for console output
const colorizedFormat = printf((info) => {
  const { level, message, timestamp: ts, stack, scope } = info;
  const color = isLevelName(level) ? levelColors[level] : chalk.white;
  const icon = isLevelName(level) ? levelIcons[level] : '📝';

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);
  const scopeStr = scope ? chalk.gray(` (${String(scope)})`) : '';
  const body = `${String(message)}${renderContext(info)}`;

  return stack
    ? `${timestampStr} ${icon} ${levelStr}${scopeStr} ${body}\n${chalk.red(String(stack))}`
    : `${timestampStr} ${icon} ${levelStr}${scopeStr} ${color(body)}`;
});

// Simple format for file output (no colors)
const fileFormat = printf((info) => {
  const { level, message, timestamp: ts, stack, scope } = info;
  const scopeStr = scope ? ` (${String(scope)})` : '';
  return `${String(ts)} [${level.toUpperCase()}]${scopeStr}: ${String(stack ?? message)}${renderContext(info)}`;
});

const baseFormat = combine(
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  errors({ stack: true }),
  splat()
);

// Create logger instance
const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: baseFormat,
  defaultMeta: { service: 'reconciliation-service' },
  transports: [
    new winston.transports.Console({
      format: combine(baseFormat, colorizedFormat),
    }),
  ],
});

// Add file transports in production
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: combine(baseFormat, fileFormat),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: combine(baseFormat, fileFormat),
    })
  );
}

/**
 * Returns a child logger tagging every line with the given scope,
 * e.g. `getLogger('BankTransactionService')`.
 */
export const getLogger = (scope: string): winston.Logger => logger.child({ scope });

const stringify = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

// Static helpers for startup banners and ad-hoc structured output
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(stringify(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(stringify(args));
  };

  public static error = (args: unknown): void => {
    logger.error(stringify(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(stringify(args));
  };

  public static http = (args: unknown): void => {
    logger.http(stringify(args));
  };

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(stringify(args)));
  };

  // Box-styled important message
  public static box = (title: string, message: string): void => {
    const line = '═'.repeat(50);
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╔${line}╗`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(49)}`) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╠${line}╣`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.white(` ${message.padEnd(49)}`) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╚${line}╝`));
  };
}

export default logger;
