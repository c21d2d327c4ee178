import { parseTaskFile, updateTaskStatus } from './task_file';
import { TaskFileError } from './task_store.errors';

const TASK_FILE = [
  '---',
  'id: task-42',
  'title: Add login',
  'status: To Do',
  'feature: auth-login',
  '---',
  '',
  '## Description',
  'Login page.',
  '',
  '## Acceptance Criteria',
  '<!-- AC:BEGIN -->',
  '- [x] #1 Form renders',
  '- [ ] #2 Errors shown',
  '<!-- AC:END -->',
  '',
].join('\n');

describe('Task files', () => {
  describe('4.1. parseTaskFile', () => {
    it('[EARS-TF01] should read id, status, metadata and criteria', () => {
      const parsed = parseTaskFile(TASK_FILE, 'task-42.md');

      expect(parsed.task).toEqual({
        id: 'task-42',
        currentState: 'To Do',
        metadata: { title: 'Add login', feature: 'auth-login' },
        acceptanceCriteria: [
          { index: 1, text: 'Form renders', checked: true },
          { index: 2, text: 'Errors shown', checked: false },
        ],
      });
      expect(parsed.body.startsWith('\n## Description')).toBe(true);
    });

    it('[EARS-TF02] should fall back to the given id and stringify numeric ids', () => {
      expect(parseTaskFile('---\nstatus: Done\n---\n', 't.md', 'task-7').task.id).toBe('task-7');
      expect(parseTaskFile('---\nid: 7\nstatus: Done\n---\n', 't.md').task.id).toBe('7');
    });

    it('[EARS-TF03] should reject files without usable front matter', () => {
      expect(() => parseTaskFile('# Just notes\n', 'notes.md')).toThrow(TaskFileError);
      expect(() => parseTaskFile('# Just notes\n', 'notes.md')).toThrow('notes.md: Missing YAML front matter');
      expect(() => parseTaskFile('---\n- a\n- b\n---\n', 'list.md')).toThrow('list.md: Front matter must be a mapping');
      expect(() => parseTaskFile('---\nid: t1\n---\n', 't1.md')).toThrow("t1.md: Front matter has no 'status'");
      expect(() => parseTaskFile('---\nstatus: [\n---\n', 'bad.md')).toThrow(/^bad\.md: Invalid front matter: /);
    });
  });

  describe('4.2. updateTaskStatus', () => {
    it('[EARS-TF04] should rewrite only the status line', () => {
      expect(updateTaskStatus(TASK_FILE, 'In Progress', 'task-42.md')).toBe(
        TASK_FILE.replace('status: To Do', 'status: In Progress')
      );
    });

    it('[EARS-TF05] should add a status line when there is none', () => {
      expect(updateTaskStatus('---\nid: t1\n---\nbody\n', 'Done', 't1.md')).toBe('---\nid: t1\nstatus: Done\n---\nbody\n');
    });

    it('[EARS-TF06] should keep CRLF files intact', () => {
      const content = '---\r\nid: t1\r\nstatus: To Do\r\n---\r\nbody\r\n';

      expect(updateTaskStatus(content, 'Done', 't1.md')).toBe('---\r\nid: t1\r\nstatus: Done\r\n---\r\nbody\r\n');
    });
  });
});
