import { Command } from 'commander';
import { ArtifactCommand } from './artifact-command';

/**
 * Register the artifact commands
 */
export function registerArtifactCommands(program: Command): void {
  const artifactCommand = new ArtifactCommand();
  artifactCommand.register(program);
}
