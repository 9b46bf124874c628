import { JudgeOutputParser } from './judge-output-parser'

const CHECK = { check_name: 'Repeated phrases', passed: true, explanation: '', severity: 0, category: 'Consistency' }
const STRENGTHS = { top_skills: ['Python'], wow_factor: 'Patent' }

describe('JudgeOutputParser', () => {
  const parser = new JudgeOutputParser()

  it('parses a plain JSON object', () => {
    const result = parser.parse(JSON.stringify({ checks: [CHECK], resume_strengths: STRENGTHS }))

    expect(result).toEqual({ ok: true, shape: 'object', checks: [CHECK], strengths: STRENGTHS })
  })

  it('parses an object wrapped in a markdown code fence', () => {
    const text = '```json\n' + JSON.stringify({ checks: [CHECK], resume_strengths: STRENGTHS }) + '\n```'

    expect(parser.parse(text)).toEqual({ ok: true, shape: 'object', checks: [CHECK], strengths: STRENGTHS })
  })

  it('finds the object inside surrounding prose', () => {
    const text = `Here is my evaluation:\n${JSON.stringify({ checks: [CHECK] })}\nLet me know if you need more.`

    expect(parser.parse(text)).toEqual({ ok: true, shape: 'object', checks: [CHECK], strengths: undefined })
  })

  it('finds the object when a bracket appears in the prose before it', () => {
    const text = `Evaluation [JSON follows]:\n${JSON.stringify({ checks: [CHECK], resume_strengths: STRENGTHS })}`

    expect(parser.parse(text)).toEqual({ ok: true, shape: 'object', checks: [CHECK], strengths: STRENGTHS })
  })

  it('does not take an array nested inside the outer object for a bare array', () => {
    const text = `Here you go: ${JSON.stringify({ results: [CHECK] })}`

    expect(parser.parse(text)).toEqual({ ok: false, reason: 'Judge output has no "checks" array', rawText: text })
  })

  it('accepts a bare array of checks without strengths', () => {
    expect(parser.parse(JSON.stringify([CHECK]))).toEqual({
      ok: true,
      shape: 'array',
      checks: [CHECK],
      strengths: undefined,
    })
  })

  it('fails on an object without a checks array', () => {
    const text = JSON.stringify({ results: [CHECK] })

    expect(parser.parse(text)).toEqual({ ok: false, reason: 'Judge output has no "checks" array', rawText: text })
  })

  it('fails when checks is not an array', () => {
    const text = JSON.stringify({ checks: 'none' })

    expect(parser.parse(text)).toEqual({ ok: false, reason: 'Judge output has no "checks" array', rawText: text })
  })

  it('fails on text without JSON', () => {
    const text = 'The resume looks fine overall.'

    expect(parser.parse(text)).toEqual({ ok: false, reason: 'Judge output is not valid JSON', rawText: text })
  })

  it('fails on empty output', () => {
    expect(parser.parse('   ')).toEqual({ ok: false, reason: 'No JSON found in judge output', rawText: '   ' })
  })

  it('fails on truncated JSON', () => {
    const text = '{"checks": [{"check_name": "Repeated phrases", "passed": tr'

    expect(parser.parse(text)).toEqual({ ok: false, reason: 'Judge output is not valid JSON', rawText: text })
  })

  describe('parsePayload', () => {
    it('rejects scalars', () => {
      expect(parser.parsePayload(42)).toEqual({ ok: false, reason: 'Judge output is neither an object nor an array' })
      expect(parser.parsePayload(null)).toEqual({ ok: false, reason: 'Judge output is neither an object nor an array' })
    })
  })
})
