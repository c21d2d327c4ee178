import type { AcceptanceCriterion, Task } from '../workflow_model';
import {
  calculateCoverage,
  coverage,
  extractAcceptanceCriteria,
  formatCoverage,
  isFullyCovered,
  uncheckedCriteria,
} from './ac_coverage';

function criterion(index: number, checked: boolean): AcceptanceCriterion {
  return { index, text: `Criterion ${index}`, checked };
}

function taskWith(criteria: AcceptanceCriterion[]): Task {
  return { id: 'task-1', currentState: 'In Implementation', acceptanceCriteria: criteria, metadata: {} };
}

describe('AC coverage', () => {
  describe('4.1. Coverage ratio', () => {
    it('[EARS-AC01] should report checked over total', () => {
      const task = taskWith([criterion(1, true), criterion(2, false), criterion(3, true), criterion(4, false)]);

      expect(coverage(task)).toEqual({ checked: 2, total: 4, ratio: 0.5 });
      expect(isFullyCovered(task)).toBe(false);
      expect(uncheckedCriteria(task).map(item => item.index)).toEqual([2, 4]);
    });

    it('[EARS-AC02] should treat a task without criteria as fully covered', () => {
      expect(calculateCoverage([])).toEqual({ checked: 0, total: 0, ratio: 1 });
      expect(isFullyCovered(taskWith([]))).toBe(true);
    });

    it('[EARS-AC03] should format a coverage line', () => {
      expect(formatCoverage({ checked: 1, total: 3, ratio: 1 / 3 })).toBe('1/3 acceptance criteria checked (33%)');
    });
  });

  describe('4.2. Extraction from task files', () => {
    it('[EARS-AC04] should read numbered checklist items from the section', () => {
      const markdown = [
        '# Task',
        '',
        '- [x] Not a criterion',
        '',
        '## Acceptance Criteria',
        '<!-- AC:BEGIN -->',
        '- [ ] #1 Login form accepts email',
        '- [x] #2 Password is masked',
        '<!-- AC:END -->',
        '',
        '## Notes',
        '- [x] #3 Ignored after the section',
      ].join('\n');

      expect(extractAcceptanceCriteria(markdown)).toEqual([
        { index: 1, text: 'Login form accepts email', checked: false },
        { index: 2, text: 'Password is masked', checked: true },
      ]);
    });

    it('[EARS-AC05] should number plain items by position and accept AC labels', () => {
      const markdown = [
        '### Acceptance Criteria',
        '- [X] AC7: Labelled item',
        '* [ ] Plain item',
        '#### Sub heading',
        '- [x] Nested item',
      ].join('\n');

      expect(extractAcceptanceCriteria(markdown)).toEqual([
        { index: 7, text: 'Labelled item', checked: true },
        { index: 2, text: 'Plain item', checked: false },
        { index: 3, text: 'Nested item', checked: true },
      ]);
    });

    it('[EARS-AC06] should accept a label line and stop at the next label', () => {
      const markdown = [
        'Acceptance Criteria:',
        '- [ ] #1 First',
        'Definition of Done:',
        '- [ ] #2 Outside',
      ].join('\n');

      expect(extractAcceptanceCriteria(markdown)).toEqual([{ index: 1, text: 'First', checked: false }]);
    });

    it('[EARS-AC07] should return nothing when the section is absent', () => {
      expect(extractAcceptanceCriteria('# Task\n- [ ] #1 Stray item\n')).toEqual([]);
    });
  });
});
