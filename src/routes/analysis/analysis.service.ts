import { Injectable } from '@nestjs/common'
import { randomUUID } from 'crypto'
import envConfig from '../../shared/config'
import { DocumentTextError, DocumentTextService } from '../../shared/services/document-text.service'
import { ResumeJudgeService } from '../../shared/services/resume-judge.service'
import { LoggerService } from '../../shared/services/logger.service'
import { JudgeOutputParser } from '../../engines/judge-output-parser'
import { ResultNormalizer } from '../../engines/result-normalizer'
import { ScoreCalculator } from '../../engines/score-calculator'
import { CategoryAggregator } from '../../engines/category-aggregator'
import { InsightGenerator } from '../../engines/insight-generator'
import { SeverityBreakdownCalculator } from '../../engines/severity-breakdown'
import { RESUME_RULE_SET_VERSION } from '../../rules/resume-checks.rules'
import type { AnalysisResultType, AnalysisSourceType } from './analysis.model'
import {
  DocumentEmptyTextException,
  DocumentMissingException,
  DocumentUnreadableException,
  DocumentUnsupportedTypeException,
  JudgeOutputUnparseableException,
  JudgeUnavailableException,
  ResumeTextTooShortException,
} from './analysis.error'

export interface ScorePayload {
  checks: unknown[]
  resume_strengths?: unknown
}

interface AnalysisContext {
  requestId: string
  source: AnalysisSourceType
  model: string | null
  startTime: number
  timings: { extraction?: number; judge?: number }
}

/**
 * AnalysisService is a PURE ORCHESTRATOR.
 *
 * Allowed:
 * - Document intake and error mapping
 * - Calling the judge and its output parser
 * - Running the engines in order (normalize → score → categories → insights)
 * - DTO assembly
 *
 * Forbidden:
 * - Thresholds, scoring formulas, insight wording
 * - Repairing judge output
 */
@Injectable()
export class AnalysisService {
  constructor(
    private readonly documentTextService: DocumentTextService,
    private readonly resumeJudge: ResumeJudgeService,
    private readonly judgeOutputParser: JudgeOutputParser,
    private readonly resultNormalizer: ResultNormalizer,
    private readonly scoreCalculator: ScoreCalculator,
    private readonly categoryAggregator: CategoryAggregator,
    private readonly insightGenerator: InsightGenerator,
    private readonly severityBreakdownCalculator: SeverityBreakdownCalculator,
    private readonly logger: LoggerService,
  ) {}

  async analyzeDocument(file: Express.Multer.File | undefined): Promise<AnalysisResultType> {
    if (!file) {
      throw DocumentMissingException
    }

    // Guard: no point extracting text the judge cannot read
    if (!this.resumeJudge.isEnabled()) {
      throw JudgeUnavailableException
    }

    const context = this.createContext('document')

    const extractionStart = Date.now()
    let resumeText: string
    try {
      resumeText = await this.documentTextService.extractText(file.buffer, file.originalname, file.mimetype)
    } catch (error) {
      if (error instanceof Error) {
        if (error.message === DocumentTextError.UNSUPPORTED_TYPE) {
          throw DocumentUnsupportedTypeException
        }
        if (error.message === DocumentTextError.EMPTY_TEXT) {
          throw DocumentEmptyTextException
        }
      }
      throw DocumentUnreadableException
    }
    context.timings.extraction = Date.now() - extractionStart

    return await this.judgeAndBuild(resumeText, context)
  }

  async analyzeText(resumeText: string): Promise<AnalysisResultType> {
    const text = this.documentTextService.normalizeText(resumeText)
    if (text.length < envConfig.MIN_RESUME_TEXT_LENGTH) {
      throw ResumeTextTooShortException
    }

    return await this.judgeAndBuild(text, this.createContext('text'))
  }

  /**
   * Score a judge payload obtained elsewhere. No LLM call.
   */
  scorePayload(payload: ScorePayload): AnalysisResultType {
    return this.buildReport(payload.checks, payload.resume_strengths, this.createContext('payload'))
  }

  private async judgeAndBuild(resumeText: string, context: AnalysisContext): Promise<AnalysisResultType> {
    const judgeStart = Date.now()
    const response = await this.resumeJudge.evaluate(resumeText)
    context.timings.judge = Date.now() - judgeStart
    context.model = response.model

    const parsed = this.judgeOutputParser.parse(response.rawText)
    if (!parsed.ok) {
      this.logger.logWarning('Judge output could not be parsed', {
        requestId: context.requestId,
        reason: parsed.reason,
      })
      throw JudgeOutputUnparseableException(parsed.rawText, parsed.reason)
    }

    return this.buildReport(parsed.checks, parsed.strengths, context)
  }

  private buildReport(rawChecks: unknown[], rawStrengths: unknown, context: AnalysisContext): AnalysisResultType {
    const scoringStart = Date.now()
    const penaltyCoefficient = envConfig.SEVERITY_PENALTY_COEFFICIENT

    // Normalization must succeed in full before anything is scored
    const checks = this.resultNormalizer.normalize(rawChecks)
    const strengths = this.resultNormalizer.normalizeStrengths(rawStrengths)

    const overallScore = this.scoreCalculator.calculateOverallScore(checks, { penaltyCoefficient })
    const categoryScores = this.categoryAggregator.calculateCategoryScores(checks)
    const insights = this.insightGenerator.generateInsights(checks, strengths)
    const severityBreakdown = this.severityBreakdownCalculator.calculate(checks)

    const scoring = Date.now() - scoringStart
    const total = Date.now() - context.startTime

    this.logger.logInfo('Resume analysis completed', {
      requestId: context.requestId,
      source: context.source,
      overallScore,
      significantIssues: severityBreakdown.critical + severityBreakdown.moderate,
      checkCount: checks.length,
      timingsMs: { ...context.timings, scoring, total },
    })

    return {
      checks,
      strengths,
      score: {
        overallScore,
        categoryScores,
      },
      insights,
      severityBreakdown,
      trace: {
        requestId: context.requestId,
        ruleSetVersion: RESUME_RULE_SET_VERSION,
        model: context.model,
        penaltyCoefficient,
        source: context.source,
        timingsMs: {
          ...context.timings,
          scoring,
          total,
        },
      },
    }
  }

  private createContext(source: AnalysisSourceType): AnalysisContext {
    return {
      requestId: randomUUID(),
      source,
      model: null,
      startTime: Date.now(),
      timings: {},
    }
  }
}
