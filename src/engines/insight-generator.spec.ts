import { InsightGenerator, joinAsSentence } from './insight-generator'
import { failedCheck, passingChecks } from '../../test/helpers/checks'
import type { StrengthsSummaryType } from '../routes/analysis/analysis.model'

const NO_STRENGTHS: StrengthsSummaryType = { top_skills: [], wow_factor: [] }

describe('InsightGenerator', () => {
  const generator = new InsightGenerator()

  it('returns no insights for an empty result set without strengths', () => {
    expect(generator.generateInsights([], NO_STRENGTHS)).toEqual([])
  })

  it('returns no insights when everything passed', () => {
    expect(generator.generateInsights(passingChecks(), NO_STRENGTHS)).toEqual([])
  })

  it('splits failures into critical and warning groups in input order', () => {
    const insights = generator.generateInsights(
      [
        failedCheck({ check_name: 'Frequent job switching', severity: 6, explanation: 'four jobs in two years' }),
        failedCheck({ check_name: 'Missing contact information', severity: 9, explanation: 'no email' }),
        failedCheck({ check_name: 'Repeated phrases', severity: 4, explanation: 'same bullet twice' }),
        failedCheck({ check_name: 'Missing key sections', severity: 8, explanation: 'no education' }),
      ],
      NO_STRENGTHS,
    )

    expect(insights).toEqual([
      {
        type: 'critical',
        title: 'Critical Issues Detected',
        description: 'Found 2 critical issues that may significantly impact candidate viability.',
        items: ['Missing contact information: no email', 'Missing key sections: no education'],
      },
      {
        type: 'warning',
        title: 'Potential Red Flags',
        description: 'Found 2 issues that warrant further discussion with the candidate.',
        items: ['Frequent job switching: four jobs in two years', 'Repeated phrases: same bullet twice'],
      },
    ])
  })

  it('builds the strength group from skills and a list of achievements', () => {
    const insights = generator.generateInsights([], {
      top_skills: ['Python', 'SQL'],
      wow_factor: ['Patent A', 'Patent B', 'Patent C'],
    })

    expect(insights).toEqual([
      {
        type: 'strength',
        title: 'Resume Strengths',
        description: "Key strengths identified in this candidate's resume:",
        items: ['Top skills: Python, SQL', 'Standout feature: Patent A, Patent B, and Patent C'],
      },
    ])
  })

  it('uses a single achievement as it is', () => {
    const [insight] = generator.generateInsights([], { top_skills: [], wow_factor: ['Keynote at a national conference'] })

    expect(insight.items).toEqual(['Standout feature: Keynote at a national conference'])
  })

  it('leaves the standout line out when there is no wow factor', () => {
    const [insight] = generator.generateInsights([], { top_skills: ['Go'], wow_factor: [] })

    expect(insight.items).toEqual(['Top skills: Go'])
  })

  it('asks one interview question per matching significant failure', () => {
    const insights = generator.generateInsights(
      [
        failedCheck({ check_name: 'Unexplained employment gaps', severity: 6, explanation: 'gap 2019-2021' }),
        failedCheck({ check_name: 'Education and experience mismatch', severity: 5, explanation: 'biology degree' }),
        failedCheck({ check_name: 'Experience and skills mismatch', severity: 9, explanation: 'no backend work' }),
      ],
      NO_STRENGTHS,
    )

    expect(insights.map((i) => i.type)).toEqual(['critical', 'warning', 'interview'])
    expect(insights[2]).toEqual({
      type: 'interview',
      title: 'Suggested Interview Questions',
      description: 'Based on resume anomalies, consider asking:',
      items: [
        'Ask about the gap between positions: "gap 2019-2021"',
        'Explore transition from education to current career path: "biology degree"',
        'Verify skill proficiency: "no backend work"',
      ],
    })
  })

  it('produces exactly one interview question for a failing employment gap check', () => {
    const insights = generator.generateInsights(
      [failedCheck({ check_name: 'Unexplained employment gaps', severity: 6, explanation: '18 months unaccounted' })],
      NO_STRENGTHS,
    )

    const interview = insights.find((i) => i.type === 'interview')
    expect(interview?.items).toEqual(['Ask about the gap between positions: "18 months unaccounted"'])
  })

  it('asks nothing for failures outside the interview checks', () => {
    const insights = generator.generateInsights(
      [failedCheck({ check_name: 'Unusual career timeline', severity: 6, explanation: 'odd dates' })],
      NO_STRENGTHS,
    )

    expect(insights.find((i) => i.type === 'interview')).toBeUndefined()
  })

  it('ignores passed checks', () => {
    const insights = generator.generateInsights(
      [{ check_name: 'Unexplained employment gaps', passed: true, explanation: '', severity: 0, category: 'Consistency' }],
      NO_STRENGTHS,
    )

    expect(insights).toEqual([])
  })

  it('orders groups critical, warning, strength, interview', () => {
    const insights = generator.generateInsights(
      [
        failedCheck({ check_name: 'Unexplained employment gaps', severity: 5, explanation: 'gap' }),
        failedCheck({ check_name: 'Missing contact information', severity: 10, explanation: 'none' }),
      ],
      { top_skills: ['Kotlin'], wow_factor: [] },
    )

    expect(insights.map((i) => i.type)).toEqual(['critical', 'warning', 'strength', 'interview'])
  })
})

describe('joinAsSentence', () => {
  it('joins lists the way a sentence reads', () => {
    expect(joinAsSentence([])).toBe('')
    expect(joinAsSentence(['a'])).toBe('a')
    expect(joinAsSentence(['a', 'b'])).toBe('a, and b')
    expect(joinAsSentence(['a', 'b', 'c'])).toBe('a, b, and c')
  })
})
