import * as fs from 'fs/promises';
import * as path from 'path';
import { assessmentReportPath, renderAssessmentReport } from '../feature_assessment';
import type { FeatureAssessment } from '../feature_assessment.types';

/**
 * Writes the markdown report under `projectRoot`, replacing an earlier one.
 * Returns the absolute path written.
 */
export async function writeAssessmentReport(projectRoot: string, assessment: FeatureAssessment): Promise<string> {
  const target = path.join(path.resolve(projectRoot), assessmentReportPath(assessment.featureName));
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, renderAssessmentReport(assessment), 'utf-8');
  return target;
}
