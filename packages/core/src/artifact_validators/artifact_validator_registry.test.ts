import { MemoryFileLister } from '../file_lister/memory';
import { AdrValidator } from './adr_validator';
import {
  ArtifactValidatorRegistry,
  createDefaultRegistry,
  validateArtifactFile,
} from './artifact_validator_registry';
import {
  ArtifactValidationError,
  UnknownArtifactTypeError,
  assertArtifactValid,
} from './artifact_validators.errors';
import type { ArtifactValidator } from './artifact_validators.types';
import { buildArtifactResult } from './artifact_result';

const nonEmpty: ArtifactValidator = {
  artifactType: 'Notes',
  validate: (artifactPath, content) => buildArtifactResult({
    artifactType: 'notes',
    artifactPath,
    errors: content.trim() ? [] : ['File is empty'],
    warnings: [],
    facts: null,
  }),
};

describe('ArtifactValidatorRegistry', () => {
  it('[EARS-AVR01] should register the bundled validators', () => {
    const registry = createDefaultRegistry();

    expect(registry.types()).toEqual(['adr', 'prd']);
    expect(registry.get('PRD')?.artifactType).toBe('prd');
    expect(registry.has('Adr')).toBe(true);
  });

  it('[EARS-AVR02] should accept custom validators', () => {
    const registry = new ArtifactValidatorRegistry().register('notes', nonEmpty);

    expect(registry.get('notes')).toBe(nonEmpty);
    expect(registry.get('prd')).toBeUndefined();
  });

  it('[EARS-AVR03] should throw for an unregistered type on require', () => {
    const registry = createDefaultRegistry();

    expect(() => registry.require('rfc')).toThrow(UnknownArtifactTypeError);
    expect(() => registry.require('rfc')).toThrow(
      "No validator registered for artifact type 'rfc' (available: adr, prd)"
    );
  });

  it('[EARS-AVR04] should turn an unreadable file into a failed result', async () => {
    const result = await validateArtifactFile(nonEmpty, 'notes/missing.md', new MemoryFileLister());

    expect(result.ok).toBe(false);
    expect(result.errors).toEqual(['File not found: notes/missing.md']);
    expect(result.detail).toBe('NOTES notes/missing.md: File not found: notes/missing.md');
  });

  it('[EARS-AVR05] should read and validate an existing file', async () => {
    const lister = new MemoryFileLister({ files: { 'notes/today.md': 'hello' } });

    expect((await validateArtifactFile(nonEmpty, 'notes/today.md', lister)).ok).toBe(true);
  });

  it('[EARS-AVR06] should throw ArtifactValidationError for a failed result', () => {
    const failed = new AdrValidator().validate('docs/adr/notes.md', '');

    expect(() => assertArtifactValid(failed)).toThrow(ArtifactValidationError);
    expect(() => assertArtifactValid(failed)).toThrow(failed.detail);
  });
});
