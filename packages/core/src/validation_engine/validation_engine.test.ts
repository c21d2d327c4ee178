import { MemoryFileLister } from '../file_lister/memory';
import type { Logger } from '../logger';
import { ConfigurationBuilder } from '../workflow_model';
import type { AcceptanceCriterion, ArtifactInput, Configuration, Task, Transition } from '../workflow_model';
import { ValidationEngine, artifactContextFor } from './validation_engine';
import { GateFailure } from './validation_engine.errors';

function taskIn(currentState: string, overrides: Partial<Task> = {}): Task {
  return { id: 'task-42', currentState, acceptanceCriteria: [], metadata: {}, ...overrides };
}

function finishConfig(outputArtifacts: ArtifactInput[] = []): Configuration {
  return new ConfigurationBuilder()
    .addState('To Do')
    .addState('Done')
    .addWorkflow({ name: 'finish' })
    .addTransition({ from: 'To Do', to: 'Done', via: 'finish', outputArtifacts })
    .build();
}

function transitionOf(config: Configuration, via: string): Transition {
  const transition = config.transitions.find(candidate => candidate.via === via);
  if (!transition) throw new Error(`No transition via ${via}`);
  return transition;
}

function mockLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('ValidationEngine', () => {
  describe('4.1. Source state', () => {
    it('[EARS-VE01] should allow a plain transition with no artifacts', async () => {
      const config = finishConfig();
      const engine = new ValidationEngine({ configuration: config, fileLister: new MemoryFileLister() });

      const result = await engine.evaluate({ task: taskIn('To Do'), transition: transitionOf(config, 'finish') });

      expect(result).toMatchObject({
        allowed: true,
        taskId: 'task-42',
        fromState: 'To Do',
        proposedState: 'Done',
        reasons: [],
        skipped: false,
      });
    });

    it('[EARS-VE02] should stop at INVALID_SOURCE_STATE', async () => {
      const config = finishConfig([{ type: 'report', path: 'report.md' }]);
      const engine = new ValidationEngine({ configuration: config, fileLister: new MemoryFileLister() });

      const result = await engine.evaluate({ task: taskIn('Done'), transition: transitionOf(config, 'finish') });

      expect(result.allowed).toBe(false);
      expect(result.proposedState).toBeNull();
      expect(result.reasons).toEqual([{
        code: 'INVALID_SOURCE_STATE',
        severity: 'fatal',
        message: "Task task-42 is in 'Done' but 'finish' starts from 'To Do'",
      }]);
    });
  });

  describe('4.2. Artifact gates', () => {
    it('[EARS-VE03] should deny when a required output file is absent', async () => {
      const config = finishConfig([{ type: 'report', path: 'report.md', required: true }]);
      const lister = new MemoryFileLister();
      const engine = new ValidationEngine({ configuration: config, fileLister: lister });
      const request = { task: taskIn('To Do'), transition: transitionOf(config, 'finish') };

      const denied = await engine.evaluate(request);

      expect(denied.allowed).toBe(false);
      expect(denied.reasons).toEqual([{
        code: 'MISSING_OUTPUT_ARTIFACT',
        severity: 'fatal',
        message: "Required output artifact 'report' not found at report.md",
        artifactType: 'report',
        artifactPath: 'report.md',
      }]);

      lister.addFile('report.md', '# Report');
      expect((await engine.evaluate(request)).allowed).toBe(true);
    });

    it('[EARS-VE04] should require at least one file under a directory pattern', async () => {
      const config = new ConfigurationBuilder()
        .addState('Planned')
        .addState('InProgress')
        .addWorkflow({ name: 'implement' })
        .addTransition({
          from: ['Planned'],
          to: 'InProgress',
          via: 'implement',
          outputArtifacts: [{ type: 'code', path: 'src/', required: true, multiple: true }],
        })
        .build();
      const lister = new MemoryFileLister({ files: { 'README.md': '' } });
      const engine = new ValidationEngine({ configuration: config, fileLister: lister });
      const request = { task: taskIn('Planned'), transition: transitionOf(config, 'implement') };

      const denied = await engine.evaluate(request);
      expect(denied.allowed).toBe(false);
      expect(denied.reasons.map(reason => [reason.code, reason.artifactPath])).toEqual([
        ['MISSING_OUTPUT_ARTIFACT', 'src/**'],
      ]);

      lister.addFile('src/index.ts', 'export {};');
      const allowed = await engine.evaluate(request);
      expect(allowed.allowed).toBe(true);
      expect(allowed.proposedState).toBe('InProgress');
    });

    it('[EARS-VE05] should collect missing inputs and outputs together', async () => {
      const config = new ConfigurationBuilder()
        .addState('Assessed')
        .addState('Specified')
        .addWorkflow({ name: 'specify' })
        .addTransition({
          from: 'Assessed',
          to: 'Specified',
          via: 'specify',
          inputArtifacts: [{ type: 'assessment', path: 'docs/assess/{feature}-assessment.md' }],
          outputArtifacts: [{ type: 'notes', path: 'docs/notes/{feature}.md' }],
        })
        .build();
      const engine = new ValidationEngine({ configuration: config, fileLister: new MemoryFileLister() });

      const result = await engine.evaluate({
        task: taskIn('Assessed', { metadata: { feature: 'auth' } }),
        transition: transitionOf(config, 'specify'),
      });

      expect(result.reasons.map(reason => [reason.code, reason.artifactPath])).toEqual([
        ['MISSING_INPUT_ARTIFACT', 'docs/assess/auth-assessment.md'],
        ['MISSING_OUTPUT_ARTIFACT', 'docs/notes/auth.md'],
      ]);
    });

    it('[EARS-VE06] should let the request context override task metadata', async () => {
      const config = finishConfig([{ type: 'notes', path: 'docs/notes/{feature}.md' }]);
      const engine = new ValidationEngine({
        configuration: config,
        fileLister: new MemoryFileLister({ files: { 'docs/notes/auth.md': 'x' } }),
      });
      const task = taskIn('To Do', { metadata: { feature: 'auth' } });
      const transition = transitionOf(config, 'finish');

      expect((await engine.evaluate({ task, transition })).allowed).toBe(true);

      const overridden = await engine.evaluate({ task, transition, artifactContext: { feature: 'billing' } });
      expect(overridden.reasons[0]?.artifactPath).toBe('docs/notes/billing.md');
    });

    it('[EARS-VE07] should match any file when a placeholder has no value', async () => {
      const config = finishConfig([{ type: 'notes', path: 'docs/notes/{feature}.md' }]);
      const lister = new MemoryFileLister();
      const engine = new ValidationEngine({ configuration: config, fileLister: lister });
      const request = { task: taskIn('To Do'), transition: transitionOf(config, 'finish') };

      expect((await engine.evaluate(request)).reasons[0]?.artifactPath).toBe('docs/notes/*.md');

      lister.addFile('docs/notes/anything.md', 'x');
      expect((await engine.evaluate(request)).allowed).toBe(true);
    });

    it('[EARS-VE08] should report ARTIFACT_INVALID for a document failing its validator', async () => {
      const config = finishConfig([{ type: 'prd', path: 'docs/prd/{feature}.md' }]);
      const engine = new ValidationEngine({
        configuration: config,
        fileLister: new MemoryFileLister({ files: { 'docs/prd/auth-login.md': '# Auth\n' } }),
      });

      const result = await engine.evaluate({
        task: taskIn('To Do', { metadata: { feature: 'auth-login' } }),
        transition: transitionOf(config, 'finish'),
      });

      expect(result.allowed).toBe(false);
      expect(result.reasons).toHaveLength(1);
      expect(result.reasons[0]).toMatchObject({
        code: 'ARTIFACT_INVALID',
        severity: 'fatal',
        artifactType: 'prd',
        artifactPath: 'docs/prd/auth-login.md',
        message: "PRD docs/prd/auth-login.md: Missing required section '## Executive Summary' (+8 more)",
      });
      expect(result.reasons[0]?.details).toHaveLength(9);
    });

    it('[EARS-VE18] should deny an artifact path resolving outside the project and keep the other reasons', async () => {
      const config = new ConfigurationBuilder()
        .addState('Assessed')
        .addState('Specified')
        .addWorkflow({ name: 'specify' })
        .addTransition({
          from: 'Assessed',
          to: 'Specified',
          via: 'specify',
          validation: 'KEYWORD["APPROVED"]',
          inputArtifacts: [{ type: 'assessment', path: 'docs/assess/{feature}-assessment.md' }],
          outputArtifacts: [{ type: 'notes', path: 'docs/notes/{feature}.md', required: false }],
        })
        .build();
      const engine = new ValidationEngine({ configuration: config, fileLister: new MemoryFileLister() });

      const result = await engine.evaluate({
        task: taskIn('Assessed'),
        transition: transitionOf(config, 'specify'),
        artifactContext: { feature: '../../outside' },
      });

      expect(result.allowed).toBe(false);
      expect(result.reasons.map(reason => reason.code)).toEqual([
        'MISSING_INPUT_ARTIFACT',
        'MISSING_OUTPUT_ARTIFACT',
        'APPROVAL_REQUIRED',
      ]);
      expect(result.reasons[0]).toEqual({
        code: 'MISSING_INPUT_ARTIFACT',
        severity: 'fatal',
        message: "Input artifact 'assessment' resolves outside the project: docs/assess/../../outside-assessment.md",
        artifactType: 'assessment',
        artifactPath: 'docs/assess/../../outside-assessment.md',
        details: ['Invalid path: path traversal not allowed: docs/assess/../../outside-assessment.md'],
      });
      expect(result.reasons[1]?.severity).toBe('fatal');
    });
  });

  describe('4.3. Validation modes', () => {
    const config = new ConfigurationBuilder()
      .addState('To Do')
      .addState('Review')
      .addState('Done')
      .addWorkflow({ name: 'approve' })
      .addWorkflow({ name: 'merge' })
      .addTransition({
        from: 'To Do',
        to: 'Review',
        via: 'approve',
        validation: 'KEYWORD["CONFIRM"]',
        inputArtifacts: [{ type: 'notes', path: 'notes.md' }],
      })
      .addTransition({ from: 'Review', to: 'Done', via: 'merge', validation: 'PULL_REQUEST' })
      .build();
    const engine = new ValidationEngine({
      configuration: config,
      fileLister: new MemoryFileLister({ files: { 'notes.md': 'ready' } }),
    });

    it('[EARS-VE09] should require the exact approval keyword', async () => {
      const base = { task: taskIn('To Do'), transition: transitionOf(config, 'approve') };

      for (const keyword of ['confirm', 'CONFIRM ', 'CONFIRMED', '']) {
        const result = await engine.evaluate({ ...base, approvalKeyword: keyword });
        expect(result.allowed).toBe(false);
        expect(result.reasons.map(reason => reason.code)).toEqual(['APPROVAL_REQUIRED']);
      }

      const missing = await engine.evaluate(base);
      expect(missing.reasons[0]?.message).toBe(
        `'approve' requires approval keyword "CONFIRM": no keyword was supplied`
      );

      const approved = await engine.evaluate({ ...base, approvalKeyword: 'CONFIRM' });
      expect(approved.allowed).toBe(true);
      expect(approved.proposedState).toBe('Review');
    });

    it('[EARS-VE10] should require a merged pull request', async () => {
      const base = { task: taskIn('Review'), transition: transitionOf(config, 'merge') };

      expect((await engine.evaluate(base)).reasons[0]?.message).toBe(
        "'merge' requires a merged pull request: no pull request status was supplied"
      );
      const open = await engine.evaluate({ ...base, pullRequest: { merged: false, number: 12 } });
      expect(open.reasons).toEqual([{
        code: 'PR_NOT_MERGED',
        severity: 'fatal',
        message: "'merge' requires a merged pull request: pull request #12 is not merged",
      }]);
      expect((await engine.evaluate({ ...base, pullRequest: { merged: true } })).allowed).toBe(true);
    });
  });

  describe('4.4. Acceptance criteria', () => {
    const criteria: AcceptanceCriterion[] = [
      { index: 1, text: 'Login works', checked: true },
      { index: 2, text: 'Docs updated', checked: false },
    ];

    it('[EARS-VE11] should add an advisory reason before a terminal state', async () => {
      const config = finishConfig();
      const engine = new ValidationEngine({ configuration: config, fileLister: new MemoryFileLister() });

      const result = await engine.evaluate({
        task: taskIn('To Do', { acceptanceCriteria: criteria }),
        transition: transitionOf(config, 'finish'),
      });

      expect(result.allowed).toBe(true);
      expect(result.reasons).toEqual([{
        code: 'INCOMPLETE_ACCEPTANCE_CRITERIA',
        severity: 'advisory',
        message: "Only 1/2 acceptance criteria are checked before 'Done'",
        details: ['#2 Docs updated'],
      }]);
    });

    it('[EARS-VE12] should block when the policy is blocking', async () => {
      const config = new ConfigurationBuilder()
        .addState('To Do')
        .addState('Done')
        .addWorkflow({ name: 'finish' })
        .addTransition({ from: 'To Do', to: 'Done', via: 'finish' })
        .setAcceptanceCriteriaPolicy('blocking')
        .build();
      const request = {
        task: taskIn('To Do', { acceptanceCriteria: criteria }),
        transition: transitionOf(config, 'finish'),
      };

      const fromDocument = new ValidationEngine({ configuration: config, fileLister: new MemoryFileLister() });
      expect((await fromDocument.evaluate(request)).allowed).toBe(false);

      const overridden = new ValidationEngine({
        configuration: config,
        fileLister: new MemoryFileLister(),
        options: { acceptanceCriteriaPolicy: 'advisory' },
      });
      expect((await overridden.evaluate(request)).allowed).toBe(true);
    });

    it('[EARS-VE13] should ignore criteria when the destination is not terminal', async () => {
      const config = new ConfigurationBuilder()
        .addState('To Do')
        .addState('Doing')
        .addState('Done')
        .addWorkflow({ name: 'start' })
        .addWorkflow({ name: 'finish' })
        .addTransition({ from: 'To Do', to: 'Doing', via: 'start' })
        .addTransition({ from: 'Doing', to: 'Done', via: 'finish' })
        .build();
      const engine = new ValidationEngine({
        configuration: config,
        fileLister: new MemoryFileLister(),
        options: { acceptanceCriteriaPolicy: 'blocking' },
      });

      const result = await engine.evaluate({
        task: taskIn('To Do', { acceptanceCriteria: criteria }),
        transition: transitionOf(config, 'start'),
      });

      expect(result.reasons).toEqual([]);
    });
  });

  describe('4.5. Overrides and failures', () => {
    it('[EARS-VE14] should skip every gate after the source check on request', async () => {
      const config = finishConfig([{ type: 'report', path: 'report.md' }]);
      const logger = mockLogger();
      const engine = new ValidationEngine({ configuration: config, fileLister: new MemoryFileLister(), logger });
      const transition = transitionOf(config, 'finish');

      const skipped = await engine.evaluate({ task: taskIn('To Do'), transition, skipValidation: true });
      expect(skipped).toMatchObject({ allowed: true, skipped: true, reasons: [], proposedState: 'Done' });
      expect(logger.warn).toHaveBeenCalledWith(
        "Validation skipped for task task-42 on 'finish' (emergency override)"
      );

      const wrongState = await engine.evaluate({ task: taskIn('Done'), transition, skipValidation: true });
      expect(wrongState.allowed).toBe(false);
      expect(wrongState.skipped).toBe(false);
    });

    it('[EARS-VE15] should log each decision', async () => {
      const config = finishConfig([{ type: 'report', path: 'report.md' }]);
      const logger = mockLogger();
      const lister = new MemoryFileLister();
      const engine = new ValidationEngine({ configuration: config, fileLister: lister, logger });
      const request = { task: taskIn('To Do'), transition: transitionOf(config, 'finish') };

      await engine.evaluate(request);
      expect(logger.warn).toHaveBeenCalledWith("Task task-42: 'finish' denied [MISSING_OUTPUT_ARTIFACT]");

      lister.addFile('report.md', 'done');
      await engine.evaluate(request);
      expect(logger.info).toHaveBeenCalledWith("Task task-42: 'finish' allowed (To Do -> Done)");
    });

    it('[EARS-VE16] should throw GateFailure from assertAllowed', async () => {
      const config = finishConfig([{ type: 'report', path: 'report.md' }]);
      const engine = new ValidationEngine({ configuration: config, fileLister: new MemoryFileLister() });
      const request = { task: taskIn('To Do'), transition: transitionOf(config, 'finish') };

      await expect(engine.assertAllowed(request)).rejects.toThrow(GateFailure);
      await expect(engine.assertAllowed(request)).rejects.toMatchObject({
        code: 'GATE_FAILED',
        message: "Transition 'finish' denied for task task-42:\n  - [MISSING_OUTPUT_ARTIFACT] Required output artifact 'report' not found at report.md",
      });
    });

    it('[EARS-VE17] should read placeholder values from task metadata', () => {
      const task = taskIn('To Do', { metadata: { feature: 'auth', number: '7', slug: ' ' } });

      expect(artifactContextFor(task)).toEqual({ feature: 'auth', slug: undefined, number: 7 });
      expect(artifactContextFor(task, { number: 3 }).number).toBe(3);
    });
  });
});
