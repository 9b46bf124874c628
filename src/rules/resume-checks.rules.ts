/**
 * RESUME ANOMALY RUBRIC
 * EVALUATION: RECRUITER-FACING, JD-INDEPENDENT
 *
 * =============================================================================
 * JUDGE-EVALUATED RULE MODEL
 * =============================================================================
 *
 * Every check below is judged by the LLM (see ResumeJudgeService). This file
 * only declares the rubric: the canonical check names the judge must echo, the
 * category each check is expected to land in, and the guidance text sent in the
 * prompt. Scoring and insight rules live in src/engines.
 *
 * Severity scale returned by the judge: 0 when passed, 1-10 when failed.
 * - severity < 4  => not actionable, demoted to a pass by the ResultNormalizer
 * - 4 <= severity < 8 => warning
 * - severity >= 8 => critical
 *
 * =============================================================================
 */

import type { CheckCategoryType } from '../routes/analysis/analysis.model'

export const RESUME_RULE_SET_VERSION = 'resume-anomaly.v1'

// =============================================================================
// SEVERITY THRESHOLDS
// =============================================================================

export const SIGNIFICANT_SEVERITY = 4
export const CRITICAL_SEVERITY = 8
export const MAX_SEVERITY = 10

// =============================================================================
// CHECK NAMES
// =============================================================================

export const CheckName = {
  GRAMMAR: 'Grammar or spelling mistakes',
  FILLER_PHRASES: 'Filler or vague phrases',
  REPEATED_PHRASES: 'Repeated phrases',
  MISSING_CONTACT_INFO: 'Missing contact information',
  MISSING_SECTIONS: 'Missing key sections',
  EMPLOYMENT_GAPS: 'Unexplained employment gaps',
  JOB_SWITCHING: 'Frequent job switching',
  EXPERIENCE_SKILLS_MISMATCH: 'Experience and skills mismatch',
  OUTDATED_TECH: 'Use of outdated technologies',
  NO_MEASURABLE_ACHIEVEMENTS: 'Lack of measurable achievements',
  EDUCATION_EXPERIENCE_MISMATCH: 'Education and experience mismatch',
  IRRELEVANT_EXPERIENCE: 'Irrelevant experience',
  ROLE_SKILL_MISMATCH: 'Role-skill mismatch',
} as const

export type CheckNameType = (typeof CheckName)[keyof typeof CheckName]

interface ResumeCheckRule {
  name: CheckNameType
  /** Category suggested to the judge; the judge's own answer is what gets scored */
  category: CheckCategoryType
  guidance: string
}

// =============================================================================
// RUBRIC
// =============================================================================

export const RESUME_CHECK_RULES: readonly ResumeCheckRule[] = [
  {
    name: CheckName.GRAMMAR,
    category: 'Format',
    guidance: 'typos, incorrect verb usage',
  },
  {
    name: CheckName.FILLER_PHRASES,
    category: 'Content',
    guidance: 'e.g. "hardworking", "motivated", "go-getter"',
  },
  {
    name: CheckName.REPEATED_PHRASES,
    category: 'Consistency',
    guidance: 'copy-pasted bullet points or phrases',
  },
  {
    name: CheckName.MISSING_CONTACT_INFO,
    category: 'Content',
    guidance: 'check that an email address and a mobile number are present',
  },
  {
    name: CheckName.MISSING_SECTIONS,
    category: 'Format',
    guidance: 'e.g. no experience, no education, no projects, no certifications',
  },
  {
    name: CheckName.EMPLOYMENT_GAPS,
    category: 'Consistency',
    guidance: 'large gaps between jobs without explanation',
  },
  {
    name: CheckName.JOB_SWITCHING,
    category: 'Credibility',
    guidance: 'only flag jobs with tenure shorter than 8 months',
  },
  {
    name: CheckName.EXPERIENCE_SKILLS_MISMATCH,
    category: 'Relevance',
    guidance: 'listed skills do not align with the job role',
  },
  {
    name: CheckName.OUTDATED_TECH,
    category: 'Relevance',
    guidance: 'e.g. Adobe Flash, languages or tools no longer used today',
  },
  {
    name: CheckName.NO_MEASURABLE_ACHIEVEMENTS,
    category: 'Credibility',
    guidance: 'responsibilities listed without quantifiable outcomes such as percentages or KPIs',
  },
  {
    name: CheckName.EDUCATION_EXPERIENCE_MISMATCH,
    category: 'Consistency',
    guidance: 'e.g. studied biology or mechanical engineering but working in software',
  },
  {
    name: CheckName.IRRELEVANT_EXPERIENCE,
    category: 'Relevance',
    guidance: 'work experience unrelated to the field the candidate specializes in',
  },
  {
    name: CheckName.ROLE_SKILL_MISMATCH,
    category: 'Relevance',
    guidance: 'e.g. job title is "Data Scientist" but no data tools appear in the work experience',
  },
]

// Notes appended to the prompt to keep the judge from over-flagging
export const RESUME_CHECK_NOTES: readonly string[] = [
  `For "${CheckName.NO_MEASURABLE_ACHIEVEMENTS}", mark it as passed if even 1 or 2 clear quantifiable metrics (numbers, percentages, KPIs, growth metrics) appear in a bullet point or its surrounding context. What matters is whether some measurable outcome is included overall.`,
  `For "${CheckName.REPEATED_PHRASES}", only fail the check if the exact same bullet point has been copy-pasted across different job roles or sections.`,
  `For "${CheckName.IRRELEVANT_EXPERIENCE}", only fail the check when the candidate lists work experience unrelated to their stated field without demonstrating transferable skills or giving context for the career shift.`,
]

const CANONICAL_NAMES = new Map<string, CheckNameType>(
  RESUME_CHECK_RULES.map((rule) => [rule.name.toLowerCase(), rule.name]),
)

/**
 * Resolve a judge-provided name to its canonical spelling.
 * Unknown names come back trimmed but otherwise untouched.
 */
export function canonicalCheckName(name: string): string {
  const trimmed = name.trim()
  return CANONICAL_NAMES.get(trimmed.toLowerCase()) ?? trimmed
}
