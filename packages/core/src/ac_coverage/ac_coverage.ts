import type { AcceptanceCriterion, Task } from '../workflow_model';
import type { CoverageReport } from './ac_coverage.types';

/** `- [ ] #1 text`, `- [x] AC2: text` or `- [x] text` */
const CHECKLIST_ITEM = /^[-*]\s+\[([ xX])\]\s+(?:#(\d+)\s+|AC(\d+):?\s+)?(.+)$/;
const HEADING = /^(#{1,6})\s+(.*?)\s*#*\s*$/;
const SECTION_TITLE = /^acceptance criteria:?$/i;

export function calculateCoverage(criteria: readonly AcceptanceCriterion[]): CoverageReport {
  const total = criteria.length;
  const checked = criteria.filter(criterion => criterion.checked).length;
  return { checked, total, ratio: total === 0 ? 1 : checked / total };
}

/**
 * Share of a task's acceptance criteria that are checked.
 */
export function coverage(task: Task): CoverageReport {
  return calculateCoverage(task.acceptanceCriteria);
}

export function isFullyCovered(task: Task): boolean {
  return coverage(task).ratio >= 1;
}

export function uncheckedCriteria(task: Task): AcceptanceCriterion[] {
  return task.acceptanceCriteria.filter(criterion => !criterion.checked);
}

export function formatCoverage(report: CoverageReport): string {
  return `${report.checked}/${report.total} acceptance criteria checked (${Math.round(report.ratio * 100)}%)`;
}

/**
 * Reads the checklist under the "Acceptance Criteria" heading (or an
 * `Acceptance Criteria:` label line) of a task file. Items without an
 * explicit number take their 1-based position.
 */
export function extractAcceptanceCriteria(markdown: string): AcceptanceCriterion[] {
  const criteria: AcceptanceCriterion[] = [];
  let sectionLevel: number | null = null;

  for (const rawLine of markdown.split(/\r?\n/)) {
    const line = rawLine.trim();
    const heading = HEADING.exec(line);

    if (sectionLevel === null) {
      if (heading?.[1] !== undefined && SECTION_TITLE.test(heading[2] ?? '')) {
        sectionLevel = heading[1].length;
      } else if (SECTION_TITLE.test(line)) {
        sectionLevel = 0;
      }
      continue;
    }

    if (heading?.[1] !== undefined && (sectionLevel === 0 || heading[1].length <= sectionLevel)) break;
    if (sectionLevel === 0 && /^[A-Z][^:]*:$/.test(line)) break;

    const item = CHECKLIST_ITEM.exec(line);
    const text = item?.[4];
    if (!item || text === undefined) continue;

    const explicitIndex = item[2] ?? item[3];
    criteria.push({
      index: explicitIndex === undefined ? criteria.length + 1 : Number.parseInt(explicitIndex, 10),
      text: text.trim(),
      checked: item[1] !== ' ',
    });
  }

  return criteria;
}
