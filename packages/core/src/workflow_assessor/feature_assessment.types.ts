/**
 * Workflow path recommended for a feature before it enters the lifecycle.
 */
export type WorkflowRecommendation = 'Full SDD' | 'Spec-Light' | 'Skip SDD';

export type AssessmentConfidence = 'High' | 'Medium' | 'Low';

/** Values accepted by `--mode`; anything else falls back to a full workflow */
export type OverrideMode = 'full' | 'light' | 'skip';

export type ScoreInput = {
  score: number;
  rationale: string;
};

export type DimensionScore = {
  readonly name: string;
  /** Integer on a 1..maxScore scale */
  readonly score: number;
  readonly rationale: string;
  readonly maxScore: number;
};

export type CategoryScore = {
  readonly category: string;
  readonly dimensions: readonly DimensionScore[];
  readonly weight: number;
};

export type ComplexityInput = {
  effortDays: ScoreInput;
  componentCount: ScoreInput;
  integrationPoints: ScoreInput;
};

export type RiskInput = {
  securityImplications: ScoreInput;
  complianceRequirements: ScoreInput;
  dataSensitivity: ScoreInput;
};

export type ArchitectureImpactInput = {
  newPatterns: ScoreInput;
  breakingChanges: ScoreInput;
  dependenciesAffected: ScoreInput;
};

export type FeatureAssessmentInput = {
  featureName: string;
  description?: string;
  complexity?: CategoryScore;
  risk?: CategoryScore;
  architectureImpact?: CategoryScore;
  overrideMode?: string;
  assessedBy?: string;
  assessedAt?: Date;
};

export type FeatureAssessment = {
  readonly featureName: string;
  readonly description: string;
  readonly complexity: CategoryScore;
  readonly risk: CategoryScore;
  readonly architectureImpact: CategoryScore;
  readonly overrideMode: string | null;
  readonly assessedBy: string;
  readonly assessedAt: Date;
};

/**
 * Serializable view of an assessment with every derived value filled in.
 * Scores are rounded to one decimal.
 */
export type AssessmentSummary = {
  featureName: string;
  description: string;
  assessedBy: string;
  assessedAt: string;
  overrideMode: string | null;
  categories: Array<{ category: string; averageScore: number; weight: number; dimensions: DimensionScore[] }>;
  totalScore: number;
  maxCategoryScore: number;
  recommendation: WorkflowRecommendation;
  confidence: AssessmentConfidence;
  rationale: string;
  nextSteps: string;
};
