import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService, LoggingConfig } from '@config/config.service';
import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

@Injectable()
export class CustomLoggerService implements LoggerService {
  private winstonLogger: winston.Logger;
  private readonly options: LoggingConfig;
  private context = 'CustomLogger';

  constructor(private readonly configService: ConfigService) {
    this.options = configService.getLoggingConfig();
    this.winstonLogger = this.createWinstonLogger();
  }

  /**
   * Build the winston logger: a console transport, plus daily files under
   * <logDirectory>/YYYY-MM-DD/ when file logging is enabled
   */
  private createWinstonLogger(): winston.Logger {
    const { level, enableFileLogging } = this.options;

    const lineFormat = (withLevelBrackets: boolean) =>
      winston.format.printf(({ timestamp, level: lvl, message, context, stack, ...meta }) => {
        const contextStr = context ? `[${String(context)}] ` : '';
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        const stackStr = stack ? `\n${String(stack)}` : '';
        const levelStr = withLevelBrackets ? `[${lvl.toUpperCase()}]` : lvl;
        return `${String(timestamp)} ${levelStr} ${contextStr}${String(message)}${metaStr}${stackStr}`;
      });

    const fileFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      lineFormat(true),
    );

    const consoleFormat = winston.format.combine(
      winston.format.colorize({ all: true }),
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      lineFormat(false),
    );

    const transports: winston.transport[] = [
      // Unhandled rejections are logged here and do not exit the process (exitOnError: false)
      new winston.transports.Console({
        level,
        format: consoleFormat,
        handleRejections: true,
      }),
    ];

    const dailyLogDirectory = enableFileLogging ? this.ensureDailyLogDirectory() : null;
    if (dailyLogDirectory) {
      transports.push(
        // All levels
        new winston.transports.File({
          filename: path.join(dailyLogDirectory, 'combined.log'),
          level,
          format: fileFormat,
        }),
        // Errors only
        new winston.transports.File({
          filename: path.join(dailyLogDirectory, 'error.log'),
          level: 'error',
          format: fileFormat,
        }),
        ...(level === 'debug'
          ? [
              new winston.transports.File({
                filename: path.join(dailyLogDirectory, 'debug.log'),
                level: 'debug',
                format: fileFormat,
              }),
            ]
          : []),
      );
    }

    const logger = winston.createLogger({
      level,
      transports,
      exitOnError: false,
    });

    if (dailyLogDirectory) {
      logger.exceptions.handle(
        new winston.transports.File({
          filename: path.join(dailyLogDirectory, 'exceptions.log'),
          format: fileFormat,
        }),
      );
      logger.rejections.handle(
        new winston.transports.File({
          filename: path.join(dailyLogDirectory, 'rejections.log'),
          format: fileFormat,
        }),
      );
    }

    logger.info(`Logger initialized with level: ${level}`, { context: this.context });
    if (dailyLogDirectory) {
      logger.info(`Daily logs directory: ${dailyLogDirectory}`, { context: this.context });
    }

    return logger;
  }

  private ensureDailyLogDirectory(): string {
    const today = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
    const dailyLogDirectory = path.join(this.options.logDirectory, today);
    if (!fs.existsSync(dailyLogDirectory)) {
      fs.mkdirSync(dailyLogDirectory, { recursive: true });
    }
    return dailyLogDirectory;
  }

  log(message: unknown, context?: string): void {
    this.winstonLogger.info(toText(message), { context: context || this.context });
  }

  error(message: unknown, stack?: string, context?: string): void {
    const contextName = context || this.context;

    if (stack) {
      this.winstonLogger.error(toText(message), { context: contextName, stack });
    } else if (message instanceof Error) {
      this.winstonLogger.error(message.message, { context: contextName, stack: message.stack });
    } else {
      this.winstonLogger.error(toText(message), { context: contextName });
    }
  }

  warn(message: unknown, context?: string): void {
    this.winstonLogger.warn(toText(message), { context: context || this.context });
  }

  debug(message: unknown, context?: string): void {
    this.winstonLogger.debug(toText(message), { context: context || this.context });
  }

  verbose(message: unknown, context?: string): void {
    this.winstonLogger.verbose(toText(message), { context: context || this.context });
  }

  /**
   * Get the Winston logger instance for advanced usage
   */
  getWinstonLogger(): winston.Logger {
    return this.winstonLogger;
  }

  /**
   * Log application startup information
   */
  logStartupInfo(port: number, environment: string): void {
    this.log('='.repeat(60), this.context);
    this.log('BITCOIN DIFFICULTY MONITOR STARTED', this.context);
    this.log('='.repeat(60), this.context);
    this.log(`Port: ${port}`, this.context);
    this.log(`Environment: ${environment}`, this.context);
    this.log(`Node RPC: ${this.configService.getRpcConfig().url}`, this.context);
    this.log(`Logs Directory: ${this.options.enableFileLogging ? this.options.logDirectory : 'disabled'}`, this.context);
    this.log(`Log Level: ${this.winstonLogger.level}`, this.context);
    this.log(`Started at: ${new Date().toISOString()}`, this.context);
    this.log('='.repeat(60), this.context);
  }

  /**
   * Log application shutdown information
   */
  logShutdownInfo(): void {
    this.log('='.repeat(60), this.context);
    this.log('BITCOIN DIFFICULTY MONITOR SHUTTING DOWN', this.context);
    this.log(`Shutdown at: ${new Date().toISOString()}`, this.context);
    this.log('='.repeat(60), this.context);
  }

  /**
   * Log monitoring activity
   */
  logMonitoringActivity(component: string, message: string, metadata?: Record<string, unknown>): void {
    const fullMessage = `[${component}] ${message}${metadata ? ` ${JSON.stringify(metadata)}` : ''}`;
    this.log(fullMessage, 'MONITORING');
  }
}

function toText(message: unknown): string {
  if (typeof message === 'string') return message;
  if (message instanceof Error) return message.message;
  if (typeof message === 'object' && message !== null) return JSON.stringify(message);
  return String(message);
}
