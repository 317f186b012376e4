/**
 * Raised once when the directory to analyze does not exist or cannot be
 * listed. Everything else the pipeline meets is recovered from locally.
 */
export class RepositoryAccessError extends Error {
  readonly root: string;

  constructor(root: string, reason: string) {
    super(`Cannot analyze ${root}: ${reason}`);
    this.name = 'RepositoryAccessError';
    this.root = root;
  }
}

export class ConfigError extends Error {
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Invalid configuration in ${source}: ${reason}`);
    this.name = 'ConfigError';
    this.source = source;
  }
}
