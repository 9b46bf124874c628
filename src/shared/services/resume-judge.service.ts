import { Injectable } from '@nestjs/common'
import { GoogleGenerativeAI } from '@google/generative-ai'
import envConfig from '../config'
import { LoggerService } from './logger.service'
import { JudgeRequestFailedException, JudgeUnavailableException } from '../../routes/analysis/analysis.error'
import { RESUME_CHECK_NOTES, RESUME_CHECK_RULES } from '../../rules/resume-checks.rules'

export interface JudgeResponse {
  rawText: string
  model: string
  latencyMs: number
}

/**
 * ResumeJudgeService
 *
 * Purpose: Ask the LLM to evaluate a resume against the rubric and hand back
 * its answer untouched.
 *
 * Allowed logic:
 * - Prompt construction from the rubric
 * - Retry on rate limiting
 * - Token usage logging
 *
 * Forbidden logic:
 * - Parsing or repairing the answer (JudgeOutputParser)
 * - Scoring, thresholds, insights (engines)
 *
 * Failures are raised, not degraded: a missing key is JudgeUnavailable,
 * a failed call is JudgeRequestFailed.
 */
@Injectable()
export class ResumeJudgeService {
  private genAI: GoogleGenerativeAI | null = null
  private readonly model = envConfig.GEMINI_MODEL

  constructor(private readonly logger: LoggerService) {
    if (envConfig.GEMINI_API_KEY) {
      this.genAI = new GoogleGenerativeAI(envConfig.GEMINI_API_KEY)
    }
  }

  async evaluate(resumeText: string): Promise<JudgeResponse> {
    const startTime = Date.now()

    if (!this.genAI) {
      this.logger.logWarning('Gemini API key not configured, resume judge unavailable')
      throw JudgeUnavailableException
    }

    const model = this.genAI.getGenerativeModel({ model: this.model })
    const prompt = this.buildPrompt(resumeText)

    try {
      const result = await this.callWithRetry(() =>
        model.generateContent({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: {
            temperature: envConfig.LLM_TEMPERATURE,
            maxOutputTokens: envConfig.LLM_MAX_OUTPUT_TOKENS,
            responseMimeType: 'application/json',
          },
        }),
      )

      // text() throws when the response was blocked (e.g. SAFETY)
      const rawText = result.response.text()

      // Log token usage
      const usage = result.response.usageMetadata
      if (usage) {
        this.logger.logTokenUsage({
          service: 'ResumeJudgeService',
          operation: 'evaluate',
          inputTokens: usage.promptTokenCount,
          outputTokens: usage.candidatesTokenCount,
          totalTokens: usage.totalTokenCount,
          model: this.model,
        })
      }

      return {
        rawText,
        model: this.model,
        latencyMs: Date.now() - startTime,
      }
    } catch (error) {
      this.logger.logError(error, {
        service: 'ResumeJudgeService',
        operation: 'evaluate',
        model: this.model,
      })
      throw JudgeRequestFailedException
    }
  }

  isEnabled(): boolean {
    return this.genAI !== null
  }

  /**
   * Retry logic with exponential backoff for rate limits
   */
  private async callWithRetry<T>(fn: () => Promise<T>, maxRetries = envConfig.LLM_MAX_RETRIES): Promise<T> {
    for (let i = 0; i < maxRetries; i++) {
      try {
        return await fn()
      } catch (error) {
        const shouldRetry = isRateLimitError(error) && i < maxRetries - 1

        if (shouldRetry) {
          const delay = Math.pow(2, i) * envConfig.LLM_RETRY_BASE_DELAY_MS // 1s, 2s, 4s by default
          this.logger.logWarning(`Rate limit hit, retrying in ${delay}ms (attempt ${i + 1}/${maxRetries})`, {
            service: 'ResumeJudgeService',
          })
          await new Promise((resolve) => setTimeout(resolve, delay))
          continue
        }
        throw error
      }
    }
    throw new Error('Max retries exceeded')
  }

  buildPrompt(resumeText: string): string {
    const checks = RESUME_CHECK_RULES.map(
      (rule, idx) => `${idx + 1}. ${rule.name} (${rule.guidance}) - usual category: ${rule.category}`,
    ).join('\n')

    const notes = RESUME_CHECK_NOTES.map((note) => `- ${note}`).join('\n')

    return `You are an expert resume reviewer for recruiters.

Evaluate the resume below against ${RESUME_CHECK_RULES.length} predefined checks. For each check:
1. Determine if it passes or fails
2. Give a brief explanation of the issue if it fails
3. Rate the severity of each failed check on a scale of 1-10 (1=minor, 10=critical)

RESUME TEXT:
"""
${resumeText}
"""

For each check return a JSON object with these fields:
- "check_name": the exact name of the check as written below
- "passed": true or false
- "explanation": brief explanation if failed, empty string if passed
- "severity": number 1-10 if failed, 0 if passed
- "category": one of "Content", "Format", "Consistency", "Relevance", "Credibility"

Also include a "resume_strengths" object with these fields:
- "top_skills": array of the top 5 skills the candidate is expert in, based on their experience and qualifications
- "wow_factor": array of extraordinary achievements such as patents, published research, conference talks, startup accomplishments, national or international awards, or honors from top universities

CHECKS:
${checks}

IMPORTANT NOTES:
${notes}

Respond with ONLY a JSON object with two properties:
1. "checks": an array of ${RESUME_CHECK_RULES.length} objects, one per check, in the order above
2. "resume_strengths": the object described above`
  }
}

function isRateLimitError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false
  if ('status' in error && error.status === 429) return true
  return error instanceof Error && error.message.includes('429')
}
