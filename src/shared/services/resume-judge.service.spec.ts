import { ResumeJudgeService } from './resume-judge.service'
import { LoggerService } from './logger.service'
import envConfig from '../config'
import { JudgeRequestFailedException, JudgeUnavailableException } from '../../routes/analysis/analysis.error'
import { RESUME_CHECK_RULES } from '../../rules/resume-checks.rules'

const mockGenerateContent = jest.fn()

jest.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel() {
      return { generateContent: mockGenerateContent }
    }
  },
}))

function geminiResponse(text: string) {
  return {
    response: {
      text: () => text,
      usageMetadata: { promptTokenCount: 120, candidatesTokenCount: 80, totalTokenCount: 200 },
    },
  }
}

function rateLimitError() {
  return Object.assign(new Error('[429 Too Many Requests] Resource has been exhausted'), { status: 429 })
}

describe('ResumeJudgeService', () => {
  let logger: LoggerService

  beforeEach(() => {
    mockGenerateContent.mockReset()
    logger = new LoggerService()
    jest.spyOn(logger, 'logTokenUsage').mockImplementation(() => undefined)
    jest.spyOn(logger, 'logWarning').mockImplementation(() => undefined)
    jest.spyOn(logger, 'logError').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('returns the raw answer untouched', async () => {
    mockGenerateContent.mockResolvedValue(geminiResponse('```json\n{"checks": []}\n```'))
    const service = new ResumeJudgeService(logger)

    const response = await service.evaluate('Jane Doe, backend engineer')

    expect(response.rawText).toBe('```json\n{"checks": []}\n```')
    expect(response.model).toBe(envConfig.GEMINI_MODEL)
    expect(mockGenerateContent).toHaveBeenCalledTimes(1)
  })

  it('logs token usage', async () => {
    mockGenerateContent.mockResolvedValue(geminiResponse('{"checks": []}'))
    const service = new ResumeJudgeService(logger)

    await service.evaluate('Jane Doe, backend engineer')

    expect(logger.logTokenUsage).toHaveBeenCalledWith({
      service: 'ResumeJudgeService',
      operation: 'evaluate',
      inputTokens: 120,
      outputTokens: 80,
      totalTokens: 200,
      model: envConfig.GEMINI_MODEL,
    })
  })

  it('retries after a rate limit and then succeeds', async () => {
    mockGenerateContent.mockRejectedValueOnce(rateLimitError()).mockResolvedValueOnce(geminiResponse('[]'))
    const service = new ResumeJudgeService(logger)

    const response = await service.evaluate('Jane Doe, backend engineer')

    expect(response.rawText).toBe('[]')
    expect(mockGenerateContent).toHaveBeenCalledTimes(2)
    expect(logger.logWarning).toHaveBeenCalledTimes(1)
  })

  it('gives up after the configured number of rate-limited attempts', async () => {
    mockGenerateContent.mockRejectedValue(rateLimitError())
    const service = new ResumeJudgeService(logger)

    await expect(service.evaluate('Jane Doe, backend engineer')).rejects.toBe(JudgeRequestFailedException)
    expect(mockGenerateContent).toHaveBeenCalledTimes(envConfig.LLM_MAX_RETRIES)
  })

  it('does not retry other failures', async () => {
    mockGenerateContent.mockRejectedValue(new Error('Invalid argument'))
    const service = new ResumeJudgeService(logger)

    await expect(service.evaluate('Jane Doe, backend engineer')).rejects.toBe(JudgeRequestFailedException)
    expect(mockGenerateContent).toHaveBeenCalledTimes(1)
    expect(logger.logError).toHaveBeenCalledTimes(1)
  })

  it('reports a blocked response as a failed judge call', async () => {
    mockGenerateContent.mockResolvedValue({
      response: {
        text: () => {
          throw new Error('[GoogleGenerativeAI Error]: Response was blocked due to SAFETY')
        },
        usageMetadata: undefined,
      },
    })
    const service = new ResumeJudgeService(logger)

    await expect(service.evaluate('Jane Doe, backend engineer')).rejects.toBe(JudgeRequestFailedException)
    expect(mockGenerateContent).toHaveBeenCalledTimes(1)
    expect(logger.logError).toHaveBeenCalledWith(expect.any(Error), {
      service: 'ResumeJudgeService',
      operation: 'evaluate',
      model: envConfig.GEMINI_MODEL,
    })
    expect(logger.logTokenUsage).not.toHaveBeenCalled()
  })

  it('is unavailable without an API key', async () => {
    jest.replaceProperty(envConfig, 'GEMINI_API_KEY', undefined)
    const service = new ResumeJudgeService(logger)

    expect(service.isEnabled()).toBe(false)
    await expect(service.evaluate('Jane Doe, backend engineer')).rejects.toBe(JudgeUnavailableException)
    expect(mockGenerateContent).not.toHaveBeenCalled()
  })

  describe('buildPrompt', () => {
    it('lists every rubric check and embeds the resume', () => {
      const service = new ResumeJudgeService(logger)
      const prompt = service.buildPrompt('Jane Doe, backend engineer')

      for (const rule of RESUME_CHECK_RULES) {
        expect(prompt).toContain(rule.name)
      }
      expect(prompt).toContain('"""\nJane Doe, backend engineer\n"""')
      expect(prompt).toContain('"resume_strengths"')
    })
  })
})
