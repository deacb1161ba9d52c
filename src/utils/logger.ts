import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors, splat } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'http' | 'debug';

interface LevelStyle {
  color: chalk.Chalk;
  bright: chalk.Chalk;
  icon: string;
}

const LEVEL_STYLES: Record<LevelName, LevelStyle> = {
  error: { color: chalk.red, bright: chalk.redBright, icon: '❌' },
  warn: { color: chalk.yellow, bright: chalk.yellowBright, icon: '⚠️ ' },
  info: { color: chalk.blue, bright: chalk.blueBright, icon: 'ℹ️ ' },
  http: { color: chalk.magenta, bright: chalk.magentaBright, icon: '🌐' },
  debug: { color: chalk.cyan, bright: chalk.cyanBright, icon: '🔍' },
};

const FALLBACK_STYLE: LevelStyle = { color: chalk.white, bright: chalk.whiteBright, icon: '📝' };

function isLevelName(level: string): level is LevelName {
  return Object.prototype.hasOwnProperty.call(LEVEL_STYLES, level);
}

function styleFor(level: string): LevelStyle {
  return isLevelName(level) ? LEVEL_STYLES[level] : FALLBACK_STYLE;
}

function scopeLabel(scope: unknown): string {
  return typeof scope === 'string' && scope.length > 0 ? `[${scope}] ` : '';
}

// Colorized console output: "[ts] icon [LEVEL] [scope] message"
const colorizedFormat = printf(({ level, message, timestamp: ts, stack, scope }) => {
  const style = styleFor(level);
  const header = `${chalk.gray(`[${String(ts)}]`)} ${style.icon} ${style.color(`[${level.toUpperCase()}]`)}`;
  const text = `${scopeLabel(scope)}${String(message)}`;

  if (typeof stack === 'string') {
    return `${header} ${style.bright(text)}\n${chalk.red(stack)}`;
  }
  return `${header} ${style.bright(text)}`;
});

// Plain output for log files
const fileFormat = printf(({ level, message, timestamp: ts, stack, scope }) => {
  const body = typeof stack === 'string' ? stack : String(message);
  return `${String(ts)} [${level.toUpperCase()}] ${scopeLabel(scope)}${body}`;
});

const baseFormat = combine(
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  errors({ stack: true }),
  splat()
);

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: baseFormat,
  defaultMeta: { service: 'tabkeeper-backend' },
  transports: [new winston.transports.Console({ format: combine(baseFormat, colorizedFormat) })],
});

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
 * Logger bound to a module scope, e.g. createScopedLogger('ledger').
 */
export function createScopedLogger(scope: string): winston.Logger {
  return logger.child({ scope });
}

function stringify(args: unknown): string {
  return typeof args === 'string' ? args : JSON.stringify(args, null, 2);
}

/**
 * Console helpers for start-up banners and one-off status lines.
 */
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

  public static success = (args: unknown): void => {
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(stringify(args)));
  };

  public static box = (title: string, message: string): void => {
    const width = Math.max(50, title.length + 2, message.length + 2);
    const line = '═'.repeat(width);
    const row = (text: string, paint: chalk.Chalk): string =>
      chalk.cyan('║') + paint(` ${text.padEnd(width - 1)}`) + chalk.cyan('║');

    // eslint-disable-next-line no-console
    console.log(
      [
        chalk.cyan(`╔${line}╗`),
        row(title, chalk.bold.cyanBright),
        chalk.cyan(`╠${line}╣`),
        row(message, chalk.white),
        chalk.cyan(`╚${line}╝`),
      ].join('\n')
    );
  };
}

export default logger;
