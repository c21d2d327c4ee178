export {
  calculateCoverage,
  coverage,
  extractAcceptanceCriteria,
  formatCoverage,
  isFullyCovered,
  uncheckedCriteria,
} from './ac_coverage';
export type { CoverageReport } from './ac_coverage.types';
