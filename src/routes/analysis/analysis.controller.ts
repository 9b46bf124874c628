import {
  Controller,
  Post,
  Body,
  HttpCode,
  HttpStatus,
  UseInterceptors,
  UploadedFile,
  ParseFilePipe,
  MaxFileSizeValidator,
} from '@nestjs/common'
import { FileInterceptor } from '@nestjs/platform-express'
import { ZodSerializerDto } from 'nestjs-zod'
import envConfig from '../../shared/config'
import { AnalysisService } from './analysis.service'
import { AnalyzeTextBodyDTO, ScorePayloadBodyDTO, AnalysisResultDTO } from './analysis.dto'
import type { AnalysisResultType } from './analysis.model'

@Controller('analysis')
export class AnalysisController {
  constructor(private readonly analysisService: AnalysisService) {}

  @Post('upload')
  @HttpCode(HttpStatus.OK)
  @ZodSerializerDto(AnalysisResultDTO)
  @UseInterceptors(FileInterceptor('file'))
  async analyzeUpload(
    @UploadedFile(
      new ParseFilePipe({
        validators: [new MaxFileSizeValidator({ maxSize: envConfig.MAX_UPLOAD_BYTES })],
        fileIsRequired: false,
        errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY,
      }),
    )
    file: Express.Multer.File | undefined,
  ): Promise<AnalysisResultType> {
    return await this.analysisService.analyzeDocument(file)
  }

  @Post('text')
  @HttpCode(HttpStatus.OK)
  @ZodSerializerDto(AnalysisResultDTO)
  async analyzeText(@Body() body: AnalyzeTextBodyDTO): Promise<AnalysisResultType> {
    return await this.analysisService.analyzeText(body.resumeText)
  }

  @Post('score')
  @HttpCode(HttpStatus.OK)
  @ZodSerializerDto(AnalysisResultDTO)
  scorePayload(@Body() body: ScorePayloadBodyDTO): AnalysisResultType {
    return this.analysisService.scorePayload(body)
  }
}
