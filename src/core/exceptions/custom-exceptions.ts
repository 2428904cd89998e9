import { HttpException, HttpStatus } from '@nestjs/common';

export type ExceptionDetails = Record<string, unknown>;

// Base custom exception class
export abstract class CustomException extends HttpException {
  constructor(
    message: string,
    statusCode: HttpStatus,
    public readonly errorCode: string,
    public readonly details?: ExceptionDetails,
  ) {
    super(
      {
        message,
        errorCode,
        details,
      },
      statusCode,
    );
  }
}

// Definition Exceptions (raised while a model is being declared)
export class DefinitionException extends CustomException {
  constructor(message: string, details?: ExceptionDetails) {
    super(
      message,
      HttpStatus.INTERNAL_SERVER_ERROR,
      'DEFINITION_ERROR',
      details,
    );
  }
}

// Usage Exceptions (raised synchronously to the caller)
export class UsageException extends CustomException {
  constructor(message: string, details?: ExceptionDetails) {
    super(message, HttpStatus.BAD_REQUEST, 'USAGE_ERROR', details);
  }
}

export class UnknownPropertyException extends UsageException {
  constructor(model: string, property: string) {
    super(`Unknown property '${property}' on model ${model}`, {
      model,
      property,
    });
  }
}

// Configuration Exceptions
export class ConfigurationException extends CustomException {
  constructor(message: string, configKey?: string) {
    super(
      `Configuration error: ${message}`,
      HttpStatus.INTERNAL_SERVER_ERROR,
      'CONFIGURATION_ERROR',
      { configKey },
    );
  }
}

// Utility function to check if an exception is a custom exception
export function isCustomException(
  exception: unknown,
): exception is CustomException {
  return exception instanceof CustomException;
}

// Utility function to get error code from any exception
export function getErrorCode(exception: unknown): string {
  if (isCustomException(exception)) {
    return exception.errorCode;
  }

  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    const errorCodeMap: Record<number, string> = {
      400: 'BAD_REQUEST',
      404: 'NOT_FOUND',
      409: 'CONFLICT',
      422: 'UNPROCESSABLE_ENTITY',
      500: 'INTERNAL_SERVER_ERROR',
      503: 'SERVICE_UNAVAILABLE',
    };
    return errorCodeMap[status] || 'UNKNOWN_ERROR';
  }

  return 'UNKNOWN_ERROR';
}
