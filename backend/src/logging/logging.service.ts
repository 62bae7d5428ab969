import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';
import 'winston-daily-rotate-file';
import * as fs from 'fs';

const LOG_DIR = 'logs';

const CHANNELS = ['conversations', 'documents', 'general'] as const;

type Channel = (typeof CHANNELS)[number];

const safeStringify = (value: unknown): string => {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    value,
    (_key, current: unknown) => {
      if (typeof current === 'object' && current !== null) {
        if (seen.has(current)) {
          return '[Circular]';
        }
        seen.add(current);
      }
      return current;
    },
    2,
  );
};

@Injectable()
export class LoggingService implements LoggerService {
  private readonly conversationLogger: winston.Logger;
  private readonly documentLogger: winston.Logger;
  private readonly generalLogger: winston.Logger;
  private readonly useFileLogging: boolean;

  constructor(private readonly configService: ConfigService) {
    // Files in development, stdout/stderr everywhere else
    const nodeEnv = this.configService.get<string>('NODE_ENV') ?? 'development';
    this.useFileLogging = nodeEnv === 'development';

    if (this.useFileLogging) {
      const dirs = [LOG_DIR, ...CHANNELS.map((channel) => `${LOG_DIR}/${channel}`)];
      for (const dir of dirs) {
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      }
    }

    this.conversationLogger = this.createChannelLogger(
      'conversations',
      'conversation',
      'debug',
      '14d',
    );
    this.documentLogger = this.createChannelLogger('documents', 'indexing', 'debug', '14d');
    this.generalLogger = this.createChannelLogger('general', 'app', 'info', '7d');
  }

  logMessageProcessing(conversationId: string, intent: string, data: Record<string, unknown>) {
    this.conversationLogger.info('Message processing', {
      conversationId,
      intent,
      data: safeStringify(data),
      timestamp: new Date().toISOString(),
    });
  }

  logEscalation(conversationId: string, message: string, reason: Record<string, unknown>) {
    this.conversationLogger.warn('Conversation escalated', {
      conversationId,
      message,
      reason: safeStringify(reason),
      timestamp: new Date().toISOString(),
    });
  }

  logIndexing(documentId: string, outcome: 'indexed' | 'failed', data: Record<string, unknown>) {
    const entry = {
      documentId,
      outcome,
      data: safeStringify(data),
      timestamp: new Date().toISOString(),
    };

    if (outcome === 'failed') {
      this.documentLogger.error('Document indexing', entry);
    } else {
      this.documentLogger.info('Document indexing', entry);
    }
  }

  // LoggerService implementation, used as the Nest application logger
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

  private createChannelLogger(
    channel: Channel,
    filePrefix: string,
    level: 'debug' | 'info',
    maxFiles: string,
  ): winston.Logger {
    const transports: winston.transport[] = this.useFileLogging
      ? [
          new winston.transports.DailyRotateFile({
            filename: `${LOG_DIR}/${channel}/${filePrefix}-%DATE%.log`,
            datePattern: 'YYYY-MM-DD',
            maxSize: '20m',
            maxFiles,
            level,
          }),
        ]
      : [
          new winston.transports.Console({
            format: winston.format.combine(
              winston.format.timestamp(),
              winston.format.errors({ stack: true }),
              winston.format.printf(({ level: entryLevel, message, timestamp, ...meta }) => {
                const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
                const label = entryLevel.toUpperCase();
                return `${String(timestamp)} [${label}] ${String(message)}${metaStr}`;
              }),
            ),
            level,
          }),
        ];

    return winston.createLogger({
      level,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
      ),
      transports,
    });
  }
}
