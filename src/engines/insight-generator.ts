import { Injectable } from '@nestjs/common'
import type { CheckResultType, InsightType, StrengthsSummaryType } from '../routes/analysis/analysis.model'
import { CRITICAL_SEVERITY, CheckName, SIGNIFICANT_SEVERITY } from '../rules/resume-checks.rules'

/**
 * INSIGHT GENERATOR
 *
 * Builds recruiter-facing insight groups from normalized check results.
 *
 * Output order is fixed and empty groups are left out:
 * 1. critical   - failed, severity >= 8
 * 2. warning    - failed, 4 <= severity < 8
 * 3. strength   - top skills / wow factor
 * 4. interview  - questions for a closed set of checks
 *
 * Rules:
 * - Only failed checks are considered (the normalizer already demoted minor ones)
 * - Items keep input order
 * - NO LLM usage
 */

// =============================================================================
// TEMPLATES
// =============================================================================

// Only these checks are worth raising in an interview; other failures stay out on purpose
const INTERVIEW_TEMPLATES: ReadonlyMap<string, (explanation: string) => string> = new Map<
  string,
  (explanation: string) => string
>([
  [CheckName.EMPLOYMENT_GAPS, (explanation: string) => `Ask about the gap between positions: "${explanation}"`],
  [
    CheckName.EDUCATION_EXPERIENCE_MISMATCH,
    (explanation: string) => `Explore transition from education to current career path: "${explanation}"`,
  ],
  [CheckName.EXPERIENCE_SKILLS_MISMATCH, (explanation: string) => `Verify skill proficiency: "${explanation}"`],
])

// =============================================================================
// SERVICE
// =============================================================================

@Injectable()
export class InsightGenerator {
  generateInsights(results: readonly CheckResultType[], strengths: StrengthsSummaryType): InsightType[] {
    const insights: InsightType[] = []
    const significant = results.filter((r) => !r.passed)

    const critical = significant.filter((r) => r.severity >= CRITICAL_SEVERITY)
    if (critical.length > 0) {
      insights.push({
        type: 'critical',
        title: 'Critical Issues Detected',
        description: `Found ${critical.length} critical issues that may significantly impact candidate viability.`,
        items: critical.map(formatIssue),
      })
    }

    const warnings = significant.filter((r) => r.severity >= SIGNIFICANT_SEVERITY && r.severity < CRITICAL_SEVERITY)
    if (warnings.length > 0) {
      insights.push({
        type: 'warning',
        title: 'Potential Red Flags',
        description: `Found ${warnings.length} issues that warrant further discussion with the candidate.`,
        items: warnings.map(formatIssue),
      })
    }

    const strengthInsight = this.buildStrengthInsight(strengths)
    if (strengthInsight) {
      insights.push(strengthInsight)
    }

    const questions = this.buildInterviewQuestions(significant)
    if (questions.length > 0) {
      insights.push({
        type: 'interview',
        title: 'Suggested Interview Questions',
        description: 'Based on resume anomalies, consider asking:',
        items: questions,
      })
    }

    return insights
  }

  private buildStrengthInsight(strengths: StrengthsSummaryType): InsightType | null {
    const items: string[] = []

    if (strengths.top_skills.length > 0) {
      items.push(`Top skills: ${strengths.top_skills.join(', ')}`)
    }

    if (strengths.wow_factor.length > 0) {
      items.push(`Standout feature: ${joinAsSentence(strengths.wow_factor)}`)
    }

    if (items.length === 0) {
      return null
    }

    return {
      type: 'strength',
      title: 'Resume Strengths',
      description: "Key strengths identified in this candidate's resume:",
      items,
    }
  }

  private buildInterviewQuestions(significant: CheckResultType[]): string[] {
    const questions: string[] = []

    for (const result of significant) {
      const template = INTERVIEW_TEMPLATES.get(result.check_name)
      if (template) {
        questions.push(template(result.explanation))
      }
    }

    return questions
  }
}

function formatIssue(result: CheckResultType): string {
  return `${result.check_name}: ${result.explanation}`
}

/**
 * ["a"] -> "a"; ["a", "b", "c"] -> "a, b, and c"
 */
export function joinAsSentence(parts: readonly string[]): string {
  if (parts.length <= 1) {
    return parts.join('')
  }
  return `${parts.slice(0, -1).join(', ')}, and ${parts[parts.length - 1]}`
}
