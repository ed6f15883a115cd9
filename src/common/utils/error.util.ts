import { HttpException, HttpStatus } from '@nestjs/common';

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_EXCLUSION_VIOLATION = '23P01';
export const PG_CHECK_VIOLATION = '23514';
export const PG_SERIALIZATION_FAILURE = '40001';
export const PG_DEADLOCK_DETECTED = '40P01';

function readResponseObject(exception: HttpException): Record<string, unknown> | null {
  const response = exception.getResponse();
  if (typeof response === 'object' && response !== null) {
    return { ...response };
  }
  return null;
}

export function getErrorStatus(error: unknown): number {
  if (error instanceof HttpException) {
    return error.getStatus();
  }

  if (!error || typeof error !== 'object') {
    return HttpStatus.INTERNAL_SERVER_ERROR;
  }

  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : null;

  if (typeof status === 'number' && Number.isFinite(status)) {
    return status;
  }

  if (typeof status === 'string') {
    const parsed = Number(status);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  return HttpStatus.INTERNAL_SERVER_ERROR;
}

export function getErrorMessage(error: unknown): string | string[] {
  if (error instanceof HttpException) {
    const res = readResponseObject(error);
    if (res) {
      const { message } = res;
      if (Array.isArray(message)) {
        return message.map(String);
      }
      if (typeof message === 'string') {
        return message;
      }
    }
    return error.message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return 'Internal server error';
}

export function getErrorMessageString(error: unknown): string {
  const message = getErrorMessage(error);
  return Array.isArray(message) ? message.join(', ') : message;
}

export function getHttpErrorName(status: number): string {
  const errorNames: Record<number, string> = {
    [HttpStatus.BAD_REQUEST]: 'Bad Request',
    [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
    [HttpStatus.FORBIDDEN]: 'Forbidden',
    [HttpStatus.NOT_FOUND]: 'Not Found',
    [HttpStatus.CONFLICT]: 'Conflict',
    [HttpStatus.TOO_MANY_REQUESTS]: 'Too Many Requests',
    [HttpStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
  };

  return errorNames[status] || 'Internal Server Error';
}

export function getErrorName(exception: unknown, status: number): string {
  if (exception instanceof HttpException) {
    const res = readResponseObject(exception);
    if (res && typeof res.error === 'string') {
      return res.error;
    }
  }

  return getHttpErrorName(status);
}

export function getErrorDetails(exception: unknown): Record<string, unknown> | undefined {
  if (!(exception instanceof HttpException)) {
    return undefined;
  }

  const details = readResponseObject(exception)?.details;
  if (typeof details === 'object' && details !== null && !Array.isArray(details)) {
    return { ...details };
  }

  return undefined;
}

export function getDriverErrorCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return undefined;
  }

  return typeof error.code === 'string' ? error.code : undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return getDriverErrorCode(error) === PG_UNIQUE_VIOLATION;
}

export function isExclusionViolation(error: unknown): boolean {
  return getDriverErrorCode(error) === PG_EXCLUSION_VIOLATION;
}

export function isSerializationFailure(error: unknown): boolean {
  const code = getDriverErrorCode(error);
  return code === PG_SERIALIZATION_FAILURE || code === PG_DEADLOCK_DETECTED;
}
