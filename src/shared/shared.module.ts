import { Global, Module } from '@nestjs/common'
import { LoggerService } from './services/logger.service'
import { DocumentTextService } from './services/document-text.service'
import { ResumeJudgeService } from './services/resume-judge.service'

const sharedServices = [LoggerService, DocumentTextService, ResumeJudgeService]

@Global()
@Module({
  providers: [...sharedServices],
  exports: [...sharedServices],
})
export class SharedModule {}
