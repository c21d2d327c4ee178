import { calculateCoverage } from '../ac_coverage';
import { createDefaultRegistry, validateArtifactFile } from '../artifact_validators';
import type { ArtifactValidatorRegistry } from '../artifact_validators';
import { FileListerError } from '../file_lister';
import type { FileLister } from '../file_lister';
import { isTerminalState } from '../graph_validator';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { describeValidationMode, resolveArtifactPattern } from '../workflow_model';
import type {
  AcceptanceCriteriaPolicy,
  ArtifactContext,
  ArtifactDescriptor,
  Configuration,
  Task,
  Transition,
} from '../workflow_model';
import { GateFailure } from './validation_engine.errors';
import type {
  GateReason,
  GateReasonCode,
  GateRequest,
  GateResult,
  ValidationEngineDependencies,
} from './validation_engine.types';

type ArtifactDirection = 'input' | 'output';

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

type LocatedArtifact = {
  descriptor: ArtifactDescriptor;
  direction: ArtifactDirection;
  /** Path or glob the descriptor resolved to */
  target: string;
  files: string[];
  /** Set when the lister refused the resolved path */
  rejection?: string;
};

const MISSING_CODES: Record<ArtifactDirection, GateReasonCode> = {
  input: 'MISSING_INPUT_ARTIFACT',
  output: 'MISSING_OUTPUT_ARTIFACT',
};

function metadataString(metadata: Task['metadata'], key: string): string | undefined {
  const value = metadata[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function metadataNumber(metadata: Task['metadata'], key: string): number | undefined {
  const value = metadata[key];
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number.parseInt(value, 10);
  return undefined;
}

/**
 * Placeholder values for a task: `feature`, `slug` and `number` from its
 * metadata, overridden by the explicit context.
 */
export function artifactContextFor(task: Task, override: ArtifactContext = {}): ArtifactContext {
  return {
    feature: override.feature ?? metadataString(task.metadata, 'feature'),
    slug: override.slug ?? metadataString(task.metadata, 'slug'),
    number: override.number ?? metadataNumber(task.metadata, 'number'),
  };
}

/**
 * Decides whether a task may take a transition. The engine only reads: it
 * proposes the destination state and leaves persisting it to the caller.
 *
 * Checks run in a fixed order. A task outside the transition's source
 * states stops evaluation; every later check runs to completion so the
 * caller sees all missing artifacts and failing documents at once.
 *
 * @example
 * ```typescript
 * const engine = new ValidationEngine({ configuration, fileLister: new FsFileLister({ cwd }) });
 * const result = await engine.evaluate({ task, transition, approvalKeyword: 'CONFIRM' });
 * if (result.allowed) await store.setState(task.id, result.proposedState);
 * ```
 */
export class ValidationEngine {
  private readonly configuration: Configuration;
  private readonly fileLister: FileLister;
  private readonly validators: ArtifactValidatorRegistry;
  private readonly logger: Logger;
  private readonly acceptanceCriteriaPolicy: AcceptanceCriteriaPolicy;

  constructor(dependencies: ValidationEngineDependencies) {
    this.configuration = dependencies.configuration;
    this.fileLister = dependencies.fileLister;
    this.validators = dependencies.validators ?? createDefaultRegistry();
    this.logger = dependencies.logger ?? createLogger('[ValidationEngine] ');
    this.acceptanceCriteriaPolicy = dependencies.options?.acceptanceCriteriaPolicy
      ?? dependencies.configuration.policy.acceptanceCriteria;
  }

  async evaluate(request: GateRequest): Promise<GateResult> {
    const { task, transition } = request;

    if (!transition.from.includes(task.currentState)) {
      return this.decide(request, [{
        code: 'INVALID_SOURCE_STATE',
        severity: 'fatal',
        message: `Task ${task.id} is in '${task.currentState}' but '${transition.name}' starts from ${transition.from.map(state => `'${state}'`).join(', ')}`,
      }], false);
    }

    if (request.skipValidation) {
      this.logger.warn(`Validation skipped for task ${task.id} on '${transition.name}' (emergency override)`);
      return this.decide(request, [], true);
    }

    const context = artifactContextFor(task, request.artifactContext);
    const reasons: GateReason[] = [];

    const located: LocatedArtifact[] = [];
    for (const descriptor of transition.inputArtifacts) {
      located.push(await this.locateArtifact(descriptor, 'input', context));
    }
    for (const descriptor of transition.outputArtifacts) {
      located.push(await this.locateArtifact(descriptor, 'output', context));
    }

    for (const artifact of located) {
      if (artifact.rejection !== undefined) {
        reasons.push({
          code: MISSING_CODES[artifact.direction],
          severity: 'fatal',
          message: `${capitalize(artifact.direction)} artifact '${artifact.descriptor.type}' resolves outside the project: ${artifact.target}`,
          artifactType: artifact.descriptor.type,
          artifactPath: artifact.target,
          details: [artifact.rejection],
        });
        continue;
      }
      if (artifact.descriptor.required && artifact.files.length === 0) {
        reasons.push({
          code: MISSING_CODES[artifact.direction],
          severity: 'fatal',
          message: `Required ${artifact.direction} artifact '${artifact.descriptor.type}' not found at ${artifact.target}`,
          artifactType: artifact.descriptor.type,
          artifactPath: artifact.target,
        });
      }
    }

    reasons.push(...await this.validateArtifactContent(located));
    reasons.push(...this.checkValidationMode(request));
    reasons.push(...this.checkAcceptanceCriteria(task, transition));

    return this.decide(request, reasons, false);
  }

  /**
   * @throws GateFailure when the transition is denied
   */
  async assertAllowed(request: GateRequest): Promise<GateResult> {
    const result = await this.evaluate(request);
    if (!result.allowed) {
      throw new GateFailure(result);
    }
    return result;
  }

  private async locateArtifact(
    descriptor: ArtifactDescriptor,
    direction: ArtifactDirection,
    context: ArtifactContext
  ): Promise<LocatedArtifact> {
    const resolved = resolveArtifactPattern(descriptor.pathPattern, context);
    const target = resolved.isConcrete && !descriptor.multiple ? resolved.path : resolved.glob;

    try {
      if (resolved.isConcrete && !descriptor.multiple) {
        const present = await this.fileLister.exists(resolved.path);
        const isFile = present && (await this.fileLister.stat(resolved.path)).isFile;
        return { descriptor, direction, target, files: isFile ? [resolved.path] : [] };
      }

      const patterns = resolved.isConcrete ? [resolved.glob, `${resolved.glob}/**`] : [resolved.glob];
      const files = await this.fileLister.list(patterns, { onlyFiles: true });
      return { descriptor, direction, target, files };
    } catch (error: unknown) {
      if (error instanceof FileListerError && error.code === 'INVALID_PATH') {
        return { descriptor, direction, target, files: [], rejection: error.message };
      }
      throw error;
    }
  }

  private async validateArtifactContent(located: LocatedArtifact[]): Promise<GateReason[]> {
    const reasons: GateReason[] = [];
    const seen = new Set<string>();

    for (const artifact of located) {
      const validator = this.validators.get(artifact.descriptor.type);
      if (!validator) continue;

      for (const file of artifact.files) {
        const key = `${artifact.descriptor.type.toLowerCase()}:${file}`;
        if (seen.has(key)) continue;
        seen.add(key);

        const result = await validateArtifactFile(validator, file, this.fileLister);
        if (!result.ok) {
          reasons.push({
            code: 'ARTIFACT_INVALID',
            severity: 'fatal',
            message: result.detail,
            artifactType: artifact.descriptor.type,
            artifactPath: file,
            details: result.errors,
          });
        }
      }
    }

    return reasons;
  }

  private checkValidationMode(request: GateRequest): GateReason[] {
    const { transition } = request;
    const mode = transition.validationMode;

    switch (mode.kind) {
      case 'none':
        return [];
      case 'keyword': {
        if (request.approvalKeyword === mode.keyword) return [];
        const supplied = request.approvalKeyword === undefined
          ? 'no keyword was supplied'
          : `'${request.approvalKeyword}' does not match`;
        return [{
          code: 'APPROVAL_REQUIRED',
          severity: 'fatal',
          message: `'${transition.name}' ${describeValidationMode(mode)}: ${supplied}`,
        }];
      }
      case 'pull_request': {
        const pullRequest = request.pullRequest;
        if (pullRequest?.merged) return [];
        const label = pullRequest?.number === undefined ? 'the pull request' : `pull request #${pullRequest.number}`;
        return [{
          code: 'PR_NOT_MERGED',
          severity: 'fatal',
          message: pullRequest
            ? `'${transition.name}' requires a merged pull request: ${label} is not merged`
            : `'${transition.name}' requires a merged pull request: no pull request status was supplied`,
        }];
      }
    }
  }

  private checkAcceptanceCriteria(task: Task, transition: Transition): GateReason[] {
    if (!isTerminalState(this.configuration, transition.to)) return [];

    const report = calculateCoverage(task.acceptanceCriteria);
    if (report.ratio >= 1) return [];

    return [{
      code: 'INCOMPLETE_ACCEPTANCE_CRITERIA',
      severity: this.acceptanceCriteriaPolicy === 'blocking' ? 'fatal' : 'advisory',
      message: `Only ${report.checked}/${report.total} acceptance criteria are checked before '${transition.to}'`,
      details: task.acceptanceCriteria
        .filter(criterion => !criterion.checked)
        .map(criterion => `#${criterion.index} ${criterion.text}`),
    }];
  }

  private decide(request: GateRequest, reasons: GateReason[], skipped: boolean): GateResult {
    const { task, transition } = request;
    const allowed = !reasons.some(reason => reason.severity === 'fatal');

    if (allowed) {
      this.logger.info(`Task ${task.id}: '${transition.name}' allowed (${task.currentState} -> ${transition.to})`);
    } else {
      const codes = Array.from(new Set(reasons.map(reason => reason.code))).join(', ');
      this.logger.warn(`Task ${task.id}: '${transition.name}' denied [${codes}]`);
    }

    return {
      allowed,
      taskId: task.id,
      transition,
      fromState: task.currentState,
      proposedState: allowed ? transition.to : null,
      reasons,
      skipped,
    };
  }
}
