import { Injectable } from '@nestjs/common'
import { z } from 'zod'
import {
  CheckCategorySchema,
  type CheckResultType,
  type StrengthsSummaryType,
} from '../routes/analysis/analysis.model'
import { MalformedCheckResultException, MalformedStrengthsException } from '../routes/analysis/analysis.error'
import { MAX_SEVERITY, SIGNIFICANT_SEVERITY, canonicalCheckName } from '../rules/resume-checks.rules'

/**
 * RESULT NORMALIZER
 *
 * Turns the judge's raw check records into well-formed CheckResult values and
 * applies the significance threshold.
 *
 * Rules:
 * - A failed check below SIGNIFICANT_SEVERITY becomes a pass (severity 0, no explanation)
 * - A passed check always carries severity 0 and an empty explanation
 * - Missing or mistyped fields fail the whole batch (MalformedCheckResult), nothing is defaulted
 *   except an absent explanation
 * - The raw payload is never mutated
 */

// =============================================================================
// RAW RECORD SCHEMA
// =============================================================================

const MAX_TOP_SKILLS = 5

const BOOLEAN_WORDS: Record<string, boolean> = {
  true: true,
  false: false,
}

function coerceBoolean(value: unknown): unknown {
  if (typeof value === 'string') {
    const known = BOOLEAN_WORDS[value.trim().toLowerCase()]
    return known ?? value
  }
  return value
}

function coerceSeverity(value: unknown): unknown {
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return Number(value)
  }
  return value
}

function coerceCategory(value: unknown): unknown {
  if (typeof value !== 'string') return value
  const lower = value.trim().toLowerCase()
  return CheckCategorySchema.options.find((category) => category.toLowerCase() === lower) ?? value
}

const RawCheckResultSchema = z.object({
  check_name: z.string().trim().min(1),
  passed: z.preprocess(coerceBoolean, z.boolean()),
  explanation: z
    .string()
    .nullish()
    .transform((value) => value?.trim() ?? ''),
  severity: z.preprocess(coerceSeverity, z.number().int().min(0).max(MAX_SEVERITY)),
  category: z.preprocess(coerceCategory, CheckCategorySchema),
})

const StringOrListSchema = z.union([z.string(), z.array(z.string())]).nullish()

const RawStrengthsSchema = z
  .object({
    top_skills: StringOrListSchema,
    wow_factor: StringOrListSchema,
  })
  .nullish()

// =============================================================================
// SERVICE
// =============================================================================

@Injectable()
export class ResultNormalizer {
  /**
   * Validate every raw record and apply the significance threshold.
   * Fails as a whole: either every record is well-formed or nothing is returned.
   */
  normalize(rawChecks: readonly unknown[]): CheckResultType[] {
    const normalized: CheckResultType[] = []
    const malformedPaths: string[] = []

    rawChecks.forEach((raw, index) => {
      const parsed = RawCheckResultSchema.safeParse(raw)
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          malformedPaths.push(['checks', index, ...issue.path].join('.'))
        }
        return
      }

      const record = parsed.data
      const significant = !record.passed && record.severity >= SIGNIFICANT_SEVERITY

      normalized.push({
        check_name: canonicalCheckName(record.check_name),
        passed: !significant,
        explanation: significant ? record.explanation : '',
        severity: significant ? record.severity : 0,
        category: record.category,
      })
    })

    if (malformedPaths.length > 0) {
      throw MalformedCheckResultException(malformedPaths)
    }

    return normalized
  }

  /**
   * Bring both strength fields to a list of non-empty strings.
   * An absent summary yields empty lists.
   */
  normalizeStrengths(raw: unknown): StrengthsSummaryType {
    const parsed = RawStrengthsSchema.safeParse(raw)
    if (!parsed.success) {
      throw MalformedStrengthsException(
        parsed.error.issues.map((issue) => ['resume_strengths', ...issue.path].join('.')),
      )
    }

    return {
      top_skills: toStringList(parsed.data?.top_skills).slice(0, MAX_TOP_SKILLS),
      wow_factor: toStringList(parsed.data?.wow_factor),
    }
  }
}

function toStringList(value: string | string[] | null | undefined): string[] {
  if (value === null || value === undefined) return []
  const list = typeof value === 'string' ? [value] : value
  return list.map((item) => item.trim()).filter((item) => item.length > 0)
}
