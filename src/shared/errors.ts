export type FailureKind = 'infrastructure' | 'assertion';

/**
 * Malformed stage graph: duplicate names, dangling `needs`, self-edges or cycles.
 * Raised while building the graph, before any stage runs.
 */
export class PipelineDefinitionError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid pipeline definition: ${problems.join('; ')}`);
    this.name = 'PipelineDefinitionError';
    this.problems = problems;
  }
}

export class ConfigError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${message} (${path})`);
    this.name = 'ConfigError';
    this.path = path;
  }
}

/**
 * A collaborator that could not be reached or could not start: spawn errors,
 * registry auth or network failures, timeouts.
 */
export class CollaboratorError extends Error {
  readonly kind: FailureKind = 'infrastructure';
  readonly collaborator: string;

  constructor(collaborator: string, message: string) {
    super(`${collaborator}: ${message}`);
    this.name = 'CollaboratorError';
    this.collaborator = collaborator;
  }
}

export class ArtifactNotFoundError extends Error {
  readonly image: string;

  constructor(image: string) {
    super(`Artifact not found: ${image}`);
    this.name = 'ArtifactNotFoundError';
    this.image = image;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
