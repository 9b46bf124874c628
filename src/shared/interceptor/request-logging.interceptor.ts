import { CallHandler, ExecutionContext, HttpException, HttpStatus, Injectable, NestInterceptor } from '@nestjs/common'
import type { Request, Response } from 'express'
import { Observable, tap } from 'rxjs'
import { LoggerService } from '../services/logger.service'

@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: LoggerService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp()
    const request = http.getRequest<Request>()
    const response = http.getResponse<Response>()
    const startTime = Date.now()

    const log = (statusCode: number) =>
      this.logger.logRequest({
        method: request.method,
        path: request.originalUrl ?? request.url,
        statusCode,
        durationMs: Date.now() - startTime,
      })

    return next.handle().pipe(
      tap({
        next: () => log(response.statusCode),
        error: (error: unknown) =>
          log(error instanceof HttpException ? error.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR),
      }),
    )
  }
}
