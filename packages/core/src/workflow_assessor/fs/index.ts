export { writeAssessmentReport } from './fs_feature_assessment';
