import { Injectable } from '@nestjs/common'
import type { CheckResultType } from '../routes/analysis/analysis.model'
import { SIGNIFICANT_SEVERITY } from '../rules/resume-checks.rules'

/**
 * SCORE CALCULATOR
 *
 * Health score = 100 - (sum of significant severities x penalty coefficient),
 * clamped to [0, 100] and rounded to one decimal.
 *
 * No checks at all scores 0: an unevaluated resume is not a healthy one.
 */

// Open tuning parameter, overridable through SEVERITY_PENALTY_COEFFICIENT
export const DEFAULT_PENALTY_COEFFICIENT = 1.0

export interface ScoreOptions {
  penaltyCoefficient?: number
}

export function roundScore(value: number): number {
  return Math.round(value * 10) / 10
}

export function clampScore(value: number): number {
  return Math.max(0, Math.min(100, value))
}

@Injectable()
export class ScoreCalculator {
  calculateOverallScore(results: readonly CheckResultType[], options?: ScoreOptions): number {
    if (results.length === 0) {
      return 0
    }

    const penaltyCoefficient = options?.penaltyCoefficient ?? DEFAULT_PENALTY_COEFFICIENT

    // Significance is rechecked here, results may not have been normalized
    const totalSeverity = results
      .filter((r) => !r.passed && r.severity >= SIGNIFICANT_SEVERITY)
      .reduce((sum, r) => sum + r.severity, 0)

    return roundScore(clampScore(100 - totalSeverity * penaltyCoefficient))
  }
}
