import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GraphValidator } from '@flowgate/core';
import { DEFAULT_TEMPLATE_PATH, initWorkflowConfig } from '@flowgate/core/fs';
import { DependencyInjectionService } from './dependency-injection';

const CYCLIC_DOCUMENT = [
  'version: "1.0"',
  'states: [Open, Closed]',
  'workflows:',
  '  close: { command: /flow:close }',
  '  reopen: { command: /flow:reopen }',
  'transitions:',
  '  - { from: Open, to: Closed, via: close }',
  '  - { from: Closed, to: Open, via: reopen }',
  '',
].join('\n');

const TASK_FILE = [
  '---',
  'id: task-7',
  'status: To Do',
  'feature: billing',
  '---',
  '',
  '## Acceptance Criteria',
  '- [ ] #1 Invoice total shown',
  '',
].join('\n');

function writeFile(root: string, relativePath: string, content: string): void {
  const target = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content, 'utf-8');
}

describe('DependencyInjectionService', () => {
  const service = DependencyInjectionService.getInstance();
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flowgate-cli-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('[EARS-DI01] should return the same instance every time', () => {
    expect(DependencyInjectionService.getInstance()).toBe(service);
  });

  it('[EARS-DI02] should discover the workflow document above the working directory', async () => {
    await initWorkflowConfig(tempDir);
    const nested = path.join(tempDir, 'src');
    fs.mkdirSync(nested);
    service.configure({ cwd: nested, env: {} });

    const loaded = await service.getConfiguration();

    expect(loaded.path).toBe(path.join(tempDir, 'flowgate_workflow.yml'));
    expect(loaded.configuration.states).toHaveLength(9);
    expect(loaded.warnings).toEqual([]);
    expect(service.getProjectRoot()).toBe(tempDir);
  });

  it('[EARS-DI03] should root the project above a .flowgate directory', () => {
    fs.mkdirSync(path.join(tempDir, '.flowgate'));
    fs.copyFileSync(DEFAULT_TEMPLATE_PATH, path.join(tempDir, '.flowgate', 'workflow.yml'));
    service.configure({ cwd: tempDir, configPath: path.join('.flowgate', 'workflow.yml'), env: {} });

    expect(service.findConfigPath()).toBe(path.join(tempDir, '.flowgate', 'workflow.yml'));
    expect(service.getProjectRoot()).toBe(tempDir);
  });

  it('[EARS-DI04] should honour FLOWGATE_CONFIG', () => {
    service.configure({ cwd: tempDir, env: { FLOWGATE_CONFIG: 'custom.yml' } });

    expect(service.findConfigPath()).toBe(path.join(tempDir, 'custom.yml'));
  });

  it('[EARS-DI05] should refuse a document whose graph has errors', async () => {
    writeFile(tempDir, 'flowgate_workflow.yml', CYCLIC_DOCUMENT);
    service.configure({ cwd: tempDir, env: {} });

    await expect(service.getConfiguration()).rejects.toThrow(GraphValidator.GraphError);
  });

  it('[EARS-DI06] should resolve --tasks-dir against the working directory', async () => {
    writeFile(tempDir, path.join('work', 'tasks', 'task-7.md'), TASK_FILE);
    service.configure({ cwd: tempDir, tasksDir: path.join('work', 'tasks'), env: {} });

    const task = await service.getTaskStore().getTask('task-7');

    expect(task?.currentState).toBe('To Do');
  });

  it('[EARS-DI07] should wire a runner that gates on project files and persists to task files', async () => {
    await initWorkflowConfig(tempDir);
    writeFile(tempDir, path.join('backlog', 'tasks', 'task-7.md'), TASK_FILE);
    service.configure({ cwd: tempDir, env: {} });
    const runner = await service.getTransitionRunner();

    await expect(runner.attempt('task-7', '/flow:assess')).rejects.toMatchObject({
      reasons: [expect.objectContaining({ code: 'MISSING_OUTPUT_ARTIFACT' })],
    });

    writeFile(tempDir, path.join('docs', 'assess', 'billing-assessment.md'), '# Billing assessment\n');
    const outcome = await runner.attempt('task-7', '/flow:assess');

    expect(outcome.persisted).toBe(true);
    expect(fs.readFileSync(path.join(tempDir, 'backlog', 'tasks', 'task-7.md'), 'utf-8')).toContain('status: Assessed');
  });
});
