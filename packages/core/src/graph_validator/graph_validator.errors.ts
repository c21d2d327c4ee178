import { FlowgateError } from '../errors';
import type { GraphIssue } from './graph_validator.types';

/**
 * The configuration's graph has fatal defects (cycles, dangling
 * references, no entry or exit). The document must be fixed before use.
 */
export class GraphError extends FlowgateError {
  constructor(
    public readonly issues: GraphIssue[],
    public readonly source: string | null = null
  ) {
    const where = source ? ` in ${source}` : '';
    const lines = issues.map(issue => `  - [${issue.code}] ${issue.message}`).join('\n');
    super(`Workflow graph has ${issues.length} error(s)${where}:\n${lines}`, 'GRAPH_INVALID');
  }
}
