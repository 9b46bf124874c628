import { Module } from '@nestjs/common'
import { JudgeOutputParser } from './judge-output-parser'
import { ResultNormalizer } from './result-normalizer'
import { ScoreCalculator } from './score-calculator'
import { CategoryAggregator } from './category-aggregator'
import { InsightGenerator } from './insight-generator'
import { SeverityBreakdownCalculator } from './severity-breakdown'

@Module({
  providers: [
    JudgeOutputParser,
    ResultNormalizer,
    ScoreCalculator,
    CategoryAggregator,
    InsightGenerator,
    SeverityBreakdownCalculator,
  ],
  exports: [
    JudgeOutputParser,
    ResultNormalizer,
    ScoreCalculator,
    CategoryAggregator,
    InsightGenerator,
    SeverityBreakdownCalculator,
  ],
})
export class EnginesModule {}
