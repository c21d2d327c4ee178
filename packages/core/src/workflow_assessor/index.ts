export {
  checkWorkflowState,
  getWorkflowForTransition,
  isValidTransition,
  nextOptions,
  nextOptionsWithCommands,
  resolveTransition,
  transitionsForWorkflow,
  validWorkflowsForState,
} from './workflow_assessor';
export type { NextOption, StateCheckResponse, StateCheckResult } from './workflow_assessor.types';

export {
  ASSESS_COMMAND,
  DEFAULT_ASSESSOR,
  FULL_WORKFLOW_THRESHOLDS,
  SPEC_LIGHT_THRESHOLDS,
  SPECIFY_COMMAND,
  architectureImpactCategory,
  assessmentNextSteps,
  assessmentRationale,
  assessmentReportPath,
  averageScore,
  complexityCategory,
  createCategory,
  createDimension,
  createFeatureAssessment,
  featureSlug,
  maxCategoryScore,
  maxDimensionScore,
  recommendWorkflow,
  renderAssessmentReport,
  riskCategory,
  summarizeAssessment,
  totalScore,
  weightedScore,
} from './feature_assessment';
export { AssessmentError } from './feature_assessment.errors';
export type { AssessmentErrorCode } from './feature_assessment.errors';
export type {
  ArchitectureImpactInput,
  AssessmentConfidence,
  AssessmentSummary,
  CategoryScore,
  ComplexityInput,
  DimensionScore,
  FeatureAssessment,
  FeatureAssessmentInput,
  OverrideMode,
  RiskInput,
  ScoreInput,
  WorkflowRecommendation,
} from './feature_assessment.types';
