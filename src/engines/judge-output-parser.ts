import { Injectable } from '@nestjs/common'

/**
 * JUDGE OUTPUT PARSER
 *
 * Resolves whatever the judge answered into one of two variants:
 * - ParsedJudgeOutput: the checks array (still raw) plus the raw strengths record
 * - UnparsedJudgeOutput: an explicit failure carrying the raw text
 *
 * Accepted shapes:
 * - { "checks": [...], "resume_strengths": {...} }
 * - [...] (bare array of checks, no strengths)
 *
 * An object without a "checks" array is a failure, never an empty result.
 */

// =============================================================================
// TYPES
// =============================================================================

export interface ParsedJudgeOutput {
  ok: true
  shape: 'object' | 'array'
  checks: unknown[]
  strengths: unknown
}

export interface UnparsedJudgeOutput {
  ok: false
  reason: string
  rawText: string
}

export type JudgeOutputParseResult = ParsedJudgeOutput | UnparsedJudgeOutput

type PayloadParseResult = ParsedJudgeOutput | { ok: false; reason: string }

const CODE_FENCE = /```(?:json)?\s*([\s\S]*?)```/i

// =============================================================================
// SERVICE
// =============================================================================

@Injectable()
export class JudgeOutputParser {
  parse(rawText: string): JudgeOutputParseResult {
    const candidates = this.extractCandidates(rawText)
    if (candidates.length === 0) {
      return { ok: false, reason: 'No JSON found in judge output', rawText }
    }

    let lastReason = 'Judge output is not valid JSON'
    for (const candidate of candidates) {
      const decoded = tryDecode(candidate)
      if (!decoded.ok) continue

      const result = this.parsePayload(decoded.value)
      if (result.ok) {
        return result
      }
      lastReason = result.reason
    }

    return { ok: false, reason: lastReason, rawText }
  }

  /**
   * Apply the shape rules to an already decoded value.
   */
  parsePayload(value: unknown): PayloadParseResult {
    if (Array.isArray(value)) {
      return { ok: true, shape: 'array', checks: value, strengths: undefined }
    }

    if (!isRecord(value)) {
      return { ok: false, reason: 'Judge output is neither an object nor an array' }
    }

    const checks = value.checks
    if (!Array.isArray(checks)) {
      return { ok: false, reason: 'Judge output has no "checks" array' }
    }

    return { ok: true, shape: 'object', checks, strengths: value.resume_strengths }
  }

  /**
   * Candidate JSON spans, most specific first:
   * whole text, fenced block, then the {...} and [...] spans by opening position
   */
  private extractCandidates(rawText: string): string[] {
    const text = rawText.trim()
    if (text.length === 0) return []

    const candidates = [text]

    const fenced = text.match(CODE_FENCE)
    if (fenced?.[1]) {
      candidates.push(fenced[1].trim())
    }

    // First-opening bracket first; a span nested inside it is not an outer value
    const spans = [spanBetween(text, '{', '}'), spanBetween(text, '[', ']')]
      .filter((span): span is TextSpan => span !== null)
      .sort((a, b) => a.start - b.start)
    for (const span of spans) {
      const outer = spans[0]
      if (span !== outer && span.start > outer.start && span.end < outer.end) continue
      candidates.push(text.slice(span.start, span.end + 1))
    }

    return [...new Set(candidates)]
  }
}

interface TextSpan {
  start: number
  end: number
}

function spanBetween(text: string, open: string, close: string): TextSpan | null {
  const start = text.indexOf(open)
  const end = text.lastIndexOf(close)
  if (start === -1 || end <= start) return null
  return { start, end }
}

function tryDecode(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text)
    return { ok: true, value }
  } catch {
    return { ok: false }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
