import { createZodDto } from 'nestjs-zod'
import { AnalyzeTextBodySchema, ScorePayloadBodySchema, AnalysisResultSchema } from './analysis.model'

export class AnalyzeTextBodyDTO extends createZodDto(AnalyzeTextBodySchema) {}
export class ScorePayloadBodyDTO extends createZodDto(ScorePayloadBodySchema) {}
export class AnalysisResultDTO extends createZodDto(AnalysisResultSchema) {}
