export type CoverageReport = {
  checked: number;
  total: number;
  /** checked / total, 1 when there is nothing to check */
  ratio: number;
};
