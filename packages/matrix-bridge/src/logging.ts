import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import type Transport from 'winston-transport';

export const levels = ['debug', 'info', 'warn', 'error'] as const;
export type Level = (typeof levels)[number];

export const isLevel = (value: string): value is Level =>
  levels.some((level) => level === value);

type Methods = {
  [K in Level]: (message: string, ...meta: unknown[]) => void;
};

interface RequestConfig {
  id: string;
  userId?: number;
  network?: string;
}

export type RequestLogger = Pick<Methods, Level>;

export type Config = {
  level: Level;
  timestamp: boolean;
  files: Partial<{
    [K in Level]: string | undefined;
  }>;
  console: boolean;
};

export class Logger {
  private static config: Config = {
    level: 'debug',
    timestamp: true,
    files: {},
    console: true,
  };

  private static cache = new Map<string, winston.Logger>();

  public static configure(config: Partial<Config>, updateAll: boolean = true): void {
    Object.assign(this.config, config);
    updateAll && this.updateAll();
  }

  private static updateAll(): void {
    Logger.cache.forEach((log) => {
      log.configure({
        level: Logger.config.level,
        format: Logger.getFormat(Logger.config.timestamp),
        transports: Logger.createTransports(),
      });
    });
  }

  public static get(name: string, opts?: Partial<Config>): winston.Logger {
    return Logger.cache.get(name) || Logger.create(name, opts);
  }

  private static create(name: string, opts?: Partial<Config>): winston.Logger {
    const logger = winston.createLogger({
      level: opts?.level ?? Logger.config.level,
      defaultMeta: { loggerName: name },
      format: Logger.getFormat(opts?.timestamp ?? Logger.config.timestamp),
      transports: Logger.createTransports(),
    });

    Logger.cache.set(name, logger);

    return logger;
  }

  /**
   * A logger for one caller-facing operation. Every line carries the
   * operation id and, when given, the user and network it concerns.
   */
  public static request(config: RequestConfig): RequestLogger {
    const base = Logger.get('request');

    const decorate = (level: Level, message: string, meta: unknown[]) => {
      base.log(level, message, ...meta, {
        reqId: config.id,
        userId: config.userId,
        network: config.network,
      });
    };

    return {
      debug: (msg, ...meta) => decorate('debug', msg, meta),
      info: (msg, ...meta) => decorate('info', msg, meta),
      warn: (msg, ...meta) => decorate('warn', msg, meta),
      error: (msg, ...meta) => decorate('error', msg, meta),
    };
  }

  public static handleUncaught() {
    process.on('uncaughtException', (err) => {
      const log = Logger.get('uncaught');

      console.error('FATAL EXCEPTION', err.stack ?? err.toString());

      if (err.stack) {
        log.error(err.stack);
      } else {
        log.error('%s: %s', err.name, err.message);
      }

      this.flushAndExit(log, 101);
    });
  }

  private static flushAndExit(log: winston.Logger, code: number): void {
    let pending = 0;
    let done = 0;

    log.transports.forEach((stream) => {
      pending += 1;

      stream.once('finish', () => {
        done += 1;
        pending === done && process.exit(code);
      });

      stream.on('error', (err: Error) => console.error('Failed to flush log transport', err));

      stream.end();
    });

    pending || process.exit(code);
  }

  public static getFormat(useTimestamp: boolean) {
    const printf = (info: winston.Logform.TransformableInfo) =>
      [
        useTimestamp ? info.timestamp : '',
        info.level.toUpperCase(),
        `( ${info.loggerName} )`,
        info.reqId ? `[${info.reqId}]` : '',
        info.userId !== undefined ? `[user=${info.userId}]` : '',
        info.network ? `[${info.network}]` : '',
        info.message,
      ]
        .filter(Boolean)
        .join(' ');

    const formats = [winston.format.splat(), winston.format.printf(printf)];

    useTimestamp && formats.unshift(winston.format.timestamp());

    return winston.format.combine(...formats);
  }

  private static createTransports() {
    const list: Transport[] = [];
    const files = Logger.config.files;

    if (Logger.config.console) {
      const transport = new winston.transports.Console({
        format: this.getFormat(Logger.config.timestamp),
        level: Logger.config.level,
      });

      list.push(transport);
    }

    for (const level of levels) {
      const filename = files[level];

      if (typeof filename !== 'string') continue;

      const transport = new DailyRotateFile({
        filename,
        level,
        format: this.getFormat(Logger.config.timestamp),
        maxFiles: 4,
        datePattern: 'YYYY-MM-DD',
        createSymlink: true,
      });

      transport.setMaxListeners(0);

      list.push(transport);
    }

    return list;
  }
}
