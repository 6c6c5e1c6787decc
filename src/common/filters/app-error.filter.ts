import { AppError, DivisionByZeroError, MalformedCompactTargetError, RpcError, ValidationError } from '@common/utils/error-handler';
import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';

export interface ErrorResponseBody {
  statusCode: number;
  code: string;
  message: string;
}

/**
 * HTTP status for an application error: bad input is the caller's fault,
 * a failing node is an upstream failure, anything else is ours
 */
export function toErrorResponse(error: AppError): ErrorResponseBody {
  let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;

  if (
    error instanceof ValidationError ||
    error instanceof MalformedCompactTargetError ||
    error instanceof DivisionByZeroError
  ) {
    statusCode = HttpStatus.BAD_REQUEST;
  } else if (error instanceof RpcError) {
    statusCode = HttpStatus.BAD_GATEWAY;
  }

  return { statusCode, code: error.code, message: error.message };
}

@Catch(AppError)
export class AppErrorFilter implements ExceptionFilter<AppError> {
  private readonly logger = new Logger(AppErrorFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(error: AppError, host: ArgumentsHost): void {
    const body = toErrorResponse(error);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${error.toString()}`, error.stack);
    } else {
      this.logger.warn(error.toString());
    }

    const { httpAdapter } = this.httpAdapterHost;
    httpAdapter.reply(host.switchToHttp().getResponse(), body, body.statusCode);
  }
}
