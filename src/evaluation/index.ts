export {
  seededRandom,
  randomInt,
  pickOne,
  randomBigIntBelow,
  shuffle,
  type RandomSource,
} from './random'

export {
  generateScenario,
  randomBlock,
  randomHostAddress,
  type Scenario,
  type ScenarioOptions,
} from './scenario-generator'

export { randomPairing } from './random-baseline'

export {
  resolveEvaluationConfig,
  parseBaseNetworks,
  DEFAULT_BASE_NETWORKS,
  DEFAULT_EVALUATION_CONFIG,
} from './config'

export {
  runTrial,
  runEvaluation,
  summarizeTrials,
  type TrialResult,
  type EvaluationSummary,
  type EvaluationRunOptions,
} from './evaluation-runner'

export {
  generateTextReport,
  generateMarkdownReport,
  improvementRatio,
  type ReportOptions,
} from './report-generator'
