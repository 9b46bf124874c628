import { Injectable } from '@nestjs/common'
import {
  CHECK_CATEGORIES,
  type CategoryScoresType,
  type CheckCategoryType,
  type CheckResultType,
} from '../routes/analysis/analysis.model'
import { roundScore } from './score-calculator'

/**
 * CATEGORY AGGREGATOR
 *
 * Per category:
 *   score = max(0, 100 x passRate - severitySum x (10 / checkCount))
 *
 * The severity deduction is scaled by category size, so a single severity-10
 * failure zeroes a one-check category but only dents a large one.
 * A category without checks scores 100.
 */

const SEVERITY_DEDUCTION_SCALE = 10

@Injectable()
export class CategoryAggregator {
  calculateCategoryScores(results: readonly CheckResultType[]): CategoryScoresType {
    const grouped = new Map<CheckCategoryType, CheckResultType[]>(CHECK_CATEGORIES.map((category) => [category, []]))

    for (const result of results) {
      // Categories outside the rubric are dropped
      grouped.get(result.category)?.push(result)
    }

    return {
      Content: this.scoreCategory(grouped.get('Content') ?? []),
      Format: this.scoreCategory(grouped.get('Format') ?? []),
      Consistency: this.scoreCategory(grouped.get('Consistency') ?? []),
      Relevance: this.scoreCategory(grouped.get('Relevance') ?? []),
      Credibility: this.scoreCategory(grouped.get('Credibility') ?? []),
    }
  }

  private scoreCategory(checks: CheckResultType[]): number {
    if (checks.length === 0) {
      return 100
    }

    const total = checks.length
    const passed = checks.filter((c) => c.passed).length
    const severitySum = checks.filter((c) => !c.passed).reduce((sum, c) => sum + c.severity, 0)

    const severityDeduction = severitySum * (SEVERITY_DEDUCTION_SCALE / total)
    const score = Math.max(0, 100 * (passed / total) - severityDeduction)

    return roundScore(score)
  }
}
