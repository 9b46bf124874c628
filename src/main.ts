import 'reflect-metadata'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import envConfig from './shared/config'
import { LoggerService } from './shared/services/logger.service'

async function bootstrap() {
  const app = await NestFactory.create(AppModule)

  app.enableCors({
    origin: envConfig.CORS_ORIGIN,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  })

  await app.listen(envConfig.PORT)
  app.get(LoggerService).logInfo(`Application is running on: http://localhost:${envConfig.PORT}`, {
    judgeModel: envConfig.GEMINI_API_KEY ? envConfig.GEMINI_MODEL : null,
    penaltyCoefficient: envConfig.SEVERITY_PENALTY_COEFFICIENT,
  })
}

bootstrap().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
