import { z } from 'zod'

// Enums
export const CheckCategorySchema = z.enum(['Content', 'Format', 'Consistency', 'Relevance', 'Credibility'])
export type CheckCategoryType = z.infer<typeof CheckCategorySchema>

export const CHECK_CATEGORIES: readonly CheckCategoryType[] = CheckCategorySchema.options

export const InsightTypeSchema = z.enum(['critical', 'warning', 'strength', 'interview'])
export type InsightTypeType = z.infer<typeof InsightTypeSchema>

export const AnalysisSourceSchema = z.enum(['document', 'text', 'payload'])
export type AnalysisSourceType = z.infer<typeof AnalysisSourceSchema>

// Check result, field names follow the JSON contract agreed with the LLM
export const CheckResultSchema = z.object({
  check_name: z.string().min(1),
  passed: z.boolean(),
  explanation: z.string(),
  severity: z.number().int().min(0).max(10),
  category: CheckCategorySchema,
})
export type CheckResultType = z.infer<typeof CheckResultSchema>

export const StrengthsSummarySchema = z.object({
  top_skills: z.array(z.string()).max(5),
  wow_factor: z.array(z.string()),
})
export type StrengthsSummaryType = z.infer<typeof StrengthsSummarySchema>

export const InsightSchema = z.object({
  type: InsightTypeSchema,
  title: z.string(),
  description: z.string(),
  items: z.array(z.string()),
})
export type InsightType = z.infer<typeof InsightSchema>

export const CategoryScoresSchema = z.object({
  Content: z.number().min(0).max(100),
  Format: z.number().min(0).max(100),
  Consistency: z.number().min(0).max(100),
  Relevance: z.number().min(0).max(100),
  Credibility: z.number().min(0).max(100),
})
export type CategoryScoresType = z.infer<typeof CategoryScoresSchema>

export const ScoreReportSchema = z.object({
  overallScore: z.number().min(0).max(100),
  categoryScores: CategoryScoresSchema,
})
export type ScoreReportType = z.infer<typeof ScoreReportSchema>

export const SeverityBreakdownSchema = z.object({
  critical: z.number().int(),
  moderate: z.number().int(),
  noIssues: z.number().int(),
})
export type SeverityBreakdownType = z.infer<typeof SeverityBreakdownSchema>

// Trace/Audit metadata
export const AnalysisTraceSchema = z.object({
  requestId: z.string().uuid(),
  ruleSetVersion: z.string(),
  model: z.string().nullable(),
  penaltyCoefficient: z.number(),
  source: AnalysisSourceSchema,
  timingsMs: z.object({
    extraction: z.number().optional(),
    judge: z.number().optional(),
    scoring: z.number(),
    total: z.number(),
  }),
})
export type AnalysisTraceType = z.infer<typeof AnalysisTraceSchema>

// Canonical analysis response
export const AnalysisResultSchema = z.object({
  checks: z.array(CheckResultSchema),
  strengths: StrengthsSummarySchema,
  score: ScoreReportSchema,
  insights: z.array(InsightSchema),
  severityBreakdown: SeverityBreakdownSchema,
  trace: AnalysisTraceSchema,
})
export type AnalysisResultType = z.infer<typeof AnalysisResultSchema>

// Requests
export const AnalyzeTextBodySchema = z
  .object({
    resumeText: z.string().trim().min(1),
  })
  .strict()

// Records are validated one by one by the result normalizer, so only the outer shape is checked here
export const ScorePayloadBodySchema = z.object({
  checks: z.array(z.unknown()),
  resume_strengths: z.unknown().optional(),
})
