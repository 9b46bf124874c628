import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common'
import type { Request, Response } from 'express'
import { LoggerService } from '../services/logger.service'

/**
 * Renders every error as JSON and logs it.
 * Anything that is not an HttpException is reported as Error.Internal without details.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: LoggerService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp()
    const response = ctx.getResponse<Response>()
    const request = ctx.getRequest<Request>()

    const isHttp = exception instanceof HttpException
    const statusCode = isHttp ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR
    const body = isHttp
      ? exception.getResponse()
      : { message: [{ message: 'Error.Internal', path: '' }], statusCode }

    const context = {
      service: 'HttpExceptionFilter',
      method: request.method,
      path: request.originalUrl ?? request.url,
      statusCode,
    }
    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.logError(exception, context)
    } else {
      this.logger.logWarning(isHttp ? exception.message : 'Request rejected', context)
    }

    response.status(statusCode).json(body)
  }
}
