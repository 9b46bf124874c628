import { Module } from '@nestjs/common'
import { APP_FILTER, APP_GUARD, APP_INTERCEPTOR, APP_PIPE } from '@nestjs/core'
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler'
import { ZodSerializerInterceptor } from 'nestjs-zod'
import envConfig from './shared/config'
import { SharedModule } from './shared/shared.module'
import CustomZodValidationPipe from './shared/pipe/custom-zod-validation.pipe'
import { HttpExceptionFilter } from './shared/filter/http-exception.filter'
import { RequestLoggingInterceptor } from './shared/interceptor/request-logging.interceptor'
import { AnalysisModule } from './routes/analysis/analysis.module'

@Module({
  imports: [
    SharedModule,
    ThrottlerModule.forRoot({
      throttlers: [
        {
          name: 'short',
          ttl: envConfig.RATE_LIMIT_SHORT_TTL,
          limit: envConfig.RATE_LIMIT_SHORT_MAX,
        },
        {
          name: 'long',
          ttl: envConfig.RATE_LIMIT_LONG_TTL,
          limit: envConfig.RATE_LIMIT_LONG_MAX,
        },
      ],
    }),
    AnalysisModule,
  ],
  providers: [
    {
      provide: APP_PIPE,
      useClass: CustomZodValidationPipe,
    },
    { provide: APP_INTERCEPTOR, useClass: RequestLoggingInterceptor },
    { provide: APP_INTERCEPTOR, useClass: ZodSerializerInterceptor },
    {
      provide: APP_FILTER,
      useClass: HttpExceptionFilter,
    },
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
