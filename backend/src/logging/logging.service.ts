import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';
import 'winston-daily-rotate-file';
import * as fs from 'fs';

type LogFields = Record<string, unknown>;

const safeStringify = (value: unknown): string => {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    value,
    (_key, item: unknown) => {
      if (typeof item === 'object' && item !== null) {
        if (seen.has(item)) {
          return '[Circular]';
        }
        seen.add(item);
      }
      if (typeof item === 'function') {
        return '[Function]';
      }
      return item;
    },
    2,
  );
};

const describeError = (error: unknown): { error: string; stack?: string } => {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
};

@Injectable()
export class LoggingService implements LoggerService {
  private readonly bookingEventLogger: winston.Logger;
  private readonly conversationLogger: winston.Logger;
  private readonly providerLogger: winston.Logger;
  private readonly generalLogger: winston.Logger;
  private readonly useFileLogging: boolean;
  private readonly silent: boolean;
  private readonly logDir = 'logs';

  constructor(private readonly configService: ConfigService) {
    // Files in development, stdout/stderr elsewhere
    const nodeEnv = this.configService.get<string>('NODE_ENV') || 'development';
    this.useFileLogging = nodeEnv === 'development';
    this.silent = nodeEnv === 'test';

    if (this.useFileLogging) {
      [
        this.logDir,
        `${this.logDir}/booking-events`,
        `${this.logDir}/conversations`,
        `${this.logDir}/providers`,
        `${this.logDir}/general`,
      ].forEach((dir) => {
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      });
    }

    this.bookingEventLogger = this.createChannel('booking-events', 'booking-event', 'debug', '14d');
    this.conversationLogger = this.createChannel('conversations', 'conversation', 'debug', '14d');
    this.providerLogger = this.createChannel('providers', 'provider', 'debug', '7d');
    this.generalLogger = this.createChannel('general', 'app', 'info', '7d');
  }

  private createChannel(
    directory: string,
    filePrefix: string,
    level: string,
    maxFiles: string,
  ): winston.Logger {
    const consoleFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level: lvl, message, timestamp, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} [${lvl.toUpperCase()}] ${String(message)}${metaStr}`;
      }),
    );

    const transports: winston.transport[] = this.useFileLogging
      ? [
          new winston.transports.DailyRotateFile({
            filename: `${this.logDir}/${directory}/${filePrefix}-%DATE%.log`,
            datePattern: 'YYYY-MM-DD',
            maxSize: '20m',
            maxFiles,
            level,
          }),
        ]
      : [new winston.transports.Console({ format: consoleFormat, level })];

    return winston.createLogger({
      level,
      silent: this.silent,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
      ),
      transports,
    });
  }

  logBookingEvent(payload: unknown, eventType: string, bookingId?: string | null) {
    this.bookingEventLogger.info('Booking event received', {
      eventType,
      bookingId: bookingId ?? undefined,
      payload: safeStringify(payload),
    });
  }

  logBookingEventError(error: unknown, payload?: unknown, eventType?: string) {
    this.bookingEventLogger.error('Booking event rejected', {
      eventType,
      ...describeError(error),
      payload: payload === undefined ? undefined : safeStringify(payload),
    });
  }

  logConversation(message: string, data: LogFields, sessionId?: string, bookingId?: string) {
    this.conversationLogger.info(message, {
      sessionId,
      bookingId,
      data: safeStringify(data),
    });
  }

  logProviderFailure(
    capability: 'geocode' | 'nearby',
    provider: string,
    reason: string,
    context?: LogFields,
  ) {
    this.providerLogger.warn('Provider attempt failed', {
      capability,
      provider,
      reason,
      context: context ? safeStringify(context) : undefined,
    });
  }

  logProviderSuccess(capability: 'geocode' | 'nearby', provider: string, context?: LogFields) {
    this.providerLogger.debug('Provider attempt succeeded', {
      capability,
      provider,
      context: context ? safeStringify(context) : undefined,
    });
  }

  log(message: unknown, context?: string) {
    this.generalLogger.info(String(message), { context });
  }

  error(message: unknown, trace?: string, context?: string) {
    this.generalLogger.error(String(message), { trace, context });
  }

  warn(message: unknown, context?: string) {
    this.generalLogger.warn(String(message), { context });
  }

  debug(message: unknown, context?: string) {
    this.generalLogger.debug(String(message), { context });
  }

  verbose(message: unknown, context?: string) {
    this.generalLogger.verbose(String(message), { context });
  }
}
