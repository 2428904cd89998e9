import { Injectable, Logger, LoggerService } from '@nestjs/common';

export interface LogContext {
  correlationId?: string;
  repository?: string;
  model?: string;
  [key: string]: unknown;
}

type LogData = Record<string, unknown>;

@Injectable()
export class LoggingService implements LoggerService {
  private readonly logger = new Logger(LoggingService.name);
  private context: LogContext = {};

  setContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  private createLogData(message: string, data?: LogData): LogData {
    const logData: LogData = {
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
    };

    if (data) {
      logData.data = data;
    }

    return logData;
  }

  error(message: string, data?: LogData): void {
    this.logger.error(this.createLogData(message, data));
  }

  warn(message: string, data?: LogData): void {
    this.logger.warn(this.createLogData(message, data));
  }

  log(message: string, data?: LogData): void {
    this.logger.log(this.createLogData(message, data));
  }

  debug(message: string, data?: LogData): void {
    this.logger.debug(this.createLogData(message, data));
  }

  verbose(message: string, data?: LogData): void {
    this.logger.verbose(this.createLogData(message, data));
  }

  logDatabaseOperation(
    operation: string,
    table: string,
    duration: number,
    success: boolean,
    error?: unknown,
  ): void {
    const logData: LogData = {
      operation,
      table,
      duration: `${duration}ms`,
      success,
    };

    if (error) {
      logData.error = error instanceof Error ? error.message : String(error);
    }

    if (success) {
      this.debug('Database Operation', logData);
    } else {
      this.error('Database Operation Failed', logData);
    }
  }
}
