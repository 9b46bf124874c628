import { Injectable } from '@nestjs/common'
import type { CheckResultType, SeverityBreakdownType } from '../routes/analysis/analysis.model'
import { CRITICAL_SEVERITY } from '../rules/resume-checks.rules'

/**
 * Counts normalized results per severity band for the dashboard bar chart.
 * Minor failures were demoted by the normalizer, so they count as noIssues.
 */
@Injectable()
export class SeverityBreakdownCalculator {
  calculate(results: readonly CheckResultType[]): SeverityBreakdownType {
    const breakdown: SeverityBreakdownType = { critical: 0, moderate: 0, noIssues: 0 }

    for (const result of results) {
      if (result.passed) {
        breakdown.noIssues++
      } else if (result.severity >= CRITICAL_SEVERITY) {
        breakdown.critical++
      } else {
        breakdown.moderate++
      }
    }

    return breakdown
  }
}
