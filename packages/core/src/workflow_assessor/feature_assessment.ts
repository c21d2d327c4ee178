import { AssessmentError } from './feature_assessment.errors';
import type {
  ArchitectureImpactInput,
  AssessmentConfidence,
  AssessmentSummary,
  CategoryScore,
  ComplexityInput,
  DimensionScore,
  FeatureAssessment,
  FeatureAssessmentInput,
  RiskInput,
  WorkflowRecommendation,
} from './feature_assessment.types';

/** A category average or total at or above these picks the full workflow */
export const FULL_WORKFLOW_THRESHOLDS = { category: 7, total: 18 } as const;
export const SPEC_LIGHT_THRESHOLDS = { category: 4, total: 10 } as const;

export const DEFAULT_ASSESSOR = 'workflow-assessor';
export const ASSESS_COMMAND = '/flow:assess';
export const SPECIFY_COMMAND = '/flow:specify';

const OVERRIDES: Record<string, WorkflowRecommendation> = {
  full: 'Full SDD',
  light: 'Spec-Light',
  skip: 'Skip SDD',
};

function oneDecimal(value: number): string {
  return value.toFixed(1);
}

function round(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * @throws AssessmentError INVALID_SCORE when the score is not an integer in 1..maxScore
 */
export function createDimension(name: string, score: number, rationale: string, maxScore = 10): DimensionScore {
  if (!Number.isInteger(score) || score < 1 || score > maxScore) {
    throw new AssessmentError(`Score must be between 1 and ${maxScore}, got ${score}`, 'INVALID_SCORE');
  }
  if (name.trim() === '') {
    throw new AssessmentError('Dimension name cannot be empty', 'INVALID_ASSESSMENT');
  }
  if (rationale.trim() === '') {
    throw new AssessmentError(`Rationale for '${name}' cannot be empty`, 'INVALID_ASSESSMENT');
  }
  return Object.freeze({ name, score, rationale, maxScore });
}

export function createCategory(category: string, dimensions: DimensionScore[] = [], weight = 1): CategoryScore {
  if (category.trim() === '') {
    throw new AssessmentError('Category name cannot be empty', 'INVALID_ASSESSMENT');
  }
  if (!(weight > 0)) {
    throw new AssessmentError(`Weight must be positive, got ${weight}`, 'INVALID_ASSESSMENT');
  }
  return Object.freeze({ category, dimensions: Object.freeze([...dimensions]), weight });
}

export function complexityCategory(input: ComplexityInput): CategoryScore {
  return createCategory('Complexity', [
    createDimension('Effort Days', input.effortDays.score, input.effortDays.rationale),
    createDimension('Component Count', input.componentCount.score, input.componentCount.rationale),
    createDimension('Integration Points', input.integrationPoints.score, input.integrationPoints.rationale),
  ]);
}

export function riskCategory(input: RiskInput): CategoryScore {
  return createCategory('Risk', [
    createDimension('Security Implications', input.securityImplications.score, input.securityImplications.rationale),
    createDimension('Compliance Requirements', input.complianceRequirements.score, input.complianceRequirements.rationale),
    createDimension('Data Sensitivity', input.dataSensitivity.score, input.dataSensitivity.rationale),
  ]);
}

export function architectureImpactCategory(input: ArchitectureImpactInput): CategoryScore {
  return createCategory('Architecture Impact', [
    createDimension('New Patterns', input.newPatterns.score, input.newPatterns.rationale),
    createDimension('Breaking Changes', input.breakingChanges.score, input.breakingChanges.rationale),
    createDimension('Dependencies Affected', input.dependenciesAffected.score, input.dependenciesAffected.rationale),
  ]);
}

/**
 * Mean of the dimension scores; 0 for a category with none.
 */
export function averageScore(category: CategoryScore): number {
  if (category.dimensions.length === 0) return 0;
  return category.dimensions.reduce((sum, dimension) => sum + dimension.score, 0) / category.dimensions.length;
}

export function weightedScore(category: CategoryScore): number {
  return averageScore(category) * category.weight;
}

export function maxDimensionScore(category: CategoryScore): number {
  return category.dimensions.reduce((max, dimension) => Math.max(max, dimension.score), 0);
}

/**
 * Missing categories start empty; `assessedAt` defaults to now.
 */
export function createFeatureAssessment(input: FeatureAssessmentInput): FeatureAssessment {
  const featureName = input.featureName.trim();
  if (featureName === '') {
    throw new AssessmentError('Feature name cannot be empty', 'INVALID_ASSESSMENT');
  }

  return Object.freeze({
    featureName,
    description: input.description?.trim() ?? '',
    complexity: input.complexity ?? createCategory('Complexity'),
    risk: input.risk ?? createCategory('Risk'),
    architectureImpact: input.architectureImpact ?? createCategory('Architecture Impact'),
    overrideMode: input.overrideMode?.trim() || null,
    assessedBy: input.assessedBy?.trim() || DEFAULT_ASSESSOR,
    assessedAt: input.assessedAt ?? new Date(),
  });
}

function categoriesOf(assessment: FeatureAssessment): CategoryScore[] {
  return [assessment.complexity, assessment.risk, assessment.architectureImpact];
}

/** Sum of the three unweighted category averages, out of 30 */
export function totalScore(assessment: FeatureAssessment): number {
  return categoriesOf(assessment).reduce((sum, category) => sum + averageScore(category), 0);
}

export function maxCategoryScore(assessment: FeatureAssessment): number {
  return Math.max(...categoriesOf(assessment).map(averageScore));
}

/**
 * An override wins with medium confidence. Otherwise the thresholds are
 * checked from the full workflow down.
 */
export function recommendWorkflow(assessment: FeatureAssessment): {
  recommendation: WorkflowRecommendation;
  confidence: AssessmentConfidence;
} {
  if (assessment.overrideMode !== null) {
    return {
      recommendation: OVERRIDES[assessment.overrideMode.toLowerCase()] ?? 'Full SDD',
      confidence: 'Medium',
    };
  }

  const max = maxCategoryScore(assessment);
  const total = totalScore(assessment);

  if (max >= FULL_WORKFLOW_THRESHOLDS.category || total >= FULL_WORKFLOW_THRESHOLDS.total) {
    return { recommendation: 'Full SDD', confidence: 'High' };
  }
  if (max >= SPEC_LIGHT_THRESHOLDS.category || total >= SPEC_LIGHT_THRESHOLDS.total) {
    return { recommendation: 'Spec-Light', confidence: 'Medium' };
  }
  return { recommendation: 'Skip SDD', confidence: 'High' };
}

function thresholdReasons(max: number, total: number, thresholds: { category: number; total: number }): string {
  const reasons: string[] = [];
  if (max >= thresholds.category) {
    reasons.push(`at least one category scored ${oneDecimal(max)}/10 (threshold: ${thresholds.category})`);
  }
  if (total >= thresholds.total) {
    reasons.push(`total score is ${oneDecimal(total)}/30 (threshold: ${thresholds.total})`);
  }
  return reasons.join(' and ');
}

export function assessmentRationale(assessment: FeatureAssessment): string {
  const { recommendation } = recommendWorkflow(assessment);

  if (assessment.overrideMode !== null) {
    return `Recommendation overridden to ${recommendation}. Scoring was bypassed on request.`;
  }

  const max = maxCategoryScore(assessment);
  const total = totalScore(assessment);

  switch (recommendation) {
    case 'Full SDD':
      return `This feature needs the full workflow because ${thresholdReasons(max, total, FULL_WORKFLOW_THRESHOLDS)}. ` +
        'High complexity or risk calls for planning and validation at every phase.';
    case 'Spec-Light':
      return `This feature needs a lightweight specification because ${thresholdReasons(max, total, SPEC_LIGHT_THRESHOLDS)}. ` +
        'A short spec covers the moderate complexity; the full workflow would be overhead.';
    case 'Skip SDD':
      return `This feature has low complexity (total: ${oneDecimal(total)}/30, max category: ${oneDecimal(max)}/10) ` +
        'and can go straight to implementation.';
  }
}

export function featureSlug(featureName: string): string {
  return featureName.trim().toLowerCase().replace(/\s+/g, '-');
}

/**
 * Where the assessment report lives; matches the `assess` transition's
 * output artifact in the bundled lifecycle.
 */
export function assessmentReportPath(featureName: string): string {
  return `docs/assess/${featureSlug(featureName)}-assessment.md`;
}

export function assessmentNextSteps(assessment: FeatureAssessment): string {
  const { recommendation } = recommendWorkflow(assessment);
  switch (recommendation) {
    case 'Full SDD':
      return `${SPECIFY_COMMAND} ${assessment.featureName}`;
    case 'Spec-Light':
      return [
        `Create a lightweight spec at ./docs/prd/${featureSlug(assessment.featureName)}-spec.md`,
        'Include the problem statement, key requirements and acceptance criteria',
        'Then proceed to implementation',
      ].join('\n');
    case 'Skip SDD':
      return ['Proceed directly to implementation', 'Record architectural decisions in ADRs as needed'].join('\n');
  }
}

export function summarizeAssessment(assessment: FeatureAssessment): AssessmentSummary {
  const { recommendation, confidence } = recommendWorkflow(assessment);
  return {
    featureName: assessment.featureName,
    description: assessment.description,
    assessedBy: assessment.assessedBy,
    assessedAt: assessment.assessedAt.toISOString(),
    overrideMode: assessment.overrideMode,
    categories: categoriesOf(assessment).map(category => ({
      category: category.category,
      averageScore: round(averageScore(category)),
      weight: category.weight,
      dimensions: [...category.dimensions],
    })),
    totalScore: round(totalScore(assessment)),
    maxCategoryScore: round(maxCategoryScore(assessment)),
    recommendation,
    confidence,
    rationale: assessmentRationale(assessment),
    nextSteps: assessmentNextSteps(assessment),
  };
}

function describeLevel(category: CategoryScore): string {
  if (category.dimensions.length === 0) return 'No dimensions assessed';
  const average = averageScore(category);
  if (average >= FULL_WORKFLOW_THRESHOLDS.category) return 'High impact requiring the full workflow';
  if (average >= SPEC_LIGHT_THRESHOLDS.category) return 'Moderate impact warranting lightweight planning';
  return 'Low impact allowing direct implementation';
}

function categoryTable(category: CategoryScore): string[] {
  return [
    `### ${category.category} Score: ${oneDecimal(averageScore(category))}/10`,
    '',
    '| Dimension | Score | Rationale |',
    '|-----------|-------|-----------|',
    ...category.dimensions.map(dimension => `| ${dimension.name} | ${dimension.score}/${dimension.maxScore} | ${dimension.rationale} |`),
    `| **Average** | **${oneDecimal(averageScore(category))}/10** | |`,
    '',
  ];
}

function nextStepsSection(assessment: FeatureAssessment, recommendation: WorkflowRecommendation): string[] {
  switch (recommendation) {
    case 'Full SDD':
      return ['### Full SDD Path', '```bash', `${SPECIFY_COMMAND} ${assessment.featureName}`, '```'];
    case 'Spec-Light':
      return ['### Spec-Light Path', '```bash', ...assessmentNextSteps(assessment).split('\n').map(line => `# ${line}`), '```'];
    case 'Skip SDD':
      return ['### Skip SDD Path', '```bash', ...assessmentNextSteps(assessment).split('\n').map(line => `# ${line}`), '```'];
  }
}

/**
 * Markdown report written to `assessmentReportPath`. Scoring sections are
 * left out when the recommendation was overridden.
 */
export function renderAssessmentReport(assessment: FeatureAssessment): string {
  const { recommendation, confidence } = recommendWorkflow(assessment);
  const overridden = assessment.overrideMode !== null;
  const lines: string[] = [
    `# Feature Assessment: ${assessment.featureName}`,
    '',
    `**Date**: ${assessment.assessedAt.toISOString().slice(0, 10)}`,
    `**Assessed By**: ${assessment.assessedBy}`,
    '**Status**: Assessed',
    '',
  ];

  if (assessment.description) {
    lines.push('## Feature Overview', '', assessment.description, '');
  }

  if (overridden) {
    lines.push(
      '## Override Mode',
      '',
      `Run with \`--mode ${assessment.overrideMode}\`; scoring was bypassed and the recommendation set by hand.`,
      ''
    );
  } else {
    lines.push('## Scoring Analysis', '');
    for (const category of categoriesOf(assessment)) {
      if (category.dimensions.length > 0) lines.push(...categoryTable(category));
    }
  }

  lines.push(
    '## Overall Assessment',
    '',
    `**Total Score**: ${oneDecimal(totalScore(assessment))}/30`,
    `**Recommendation**: ${recommendation}`,
    `**Confidence**: ${confidence}`,
    '',
    '### Rationale',
    '',
    assessmentRationale(assessment),
    ''
  );

  if (!overridden) {
    lines.push(
      '### Key Factors',
      '',
      ...categoriesOf(assessment).map(category =>
        `- **${category.category}**: ${oneDecimal(averageScore(category))}/10 - ${describeLevel(category)}`
      ),
      ''
    );
  }

  lines.push(
    '## Next Steps',
    '',
    ...nextStepsSection(assessment, recommendation),
    '',
    '## Override',
    '',
    '```bash',
    `${ASSESS_COMMAND} ${assessment.featureName} --mode full`,
    `${ASSESS_COMMAND} ${assessment.featureName} --mode light`,
    `${ASSESS_COMMAND} ${assessment.featureName} --mode skip`,
    '```',
    ''
  );

  return lines.join('\n');
}
