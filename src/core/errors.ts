import type { Cluster } from './cluster';

export type HarnessErrorKind =
  | 'SequenceError'
  | 'ConfigError'
  | 'ClusterStartError'
  | 'RollingUpdateError'
  | 'SchemaError'
  | 'ImportError'
  | 'DataLossError'
  | 'AggregateMismatchError'
  | 'TimeoutError'
  | 'DataServiceError';

export abstract class HarnessError extends Error {
  abstract readonly kind: HarnessErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SequenceError extends HarnessError {
  readonly kind = 'SequenceError';
}

export class ConfigError extends HarnessError {
  readonly kind = 'ConfigError';
}

export class TimeoutError extends HarnessError {
  readonly kind = 'TimeoutError';

  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastReason: string,
  ) {
    super(`timed out waiting for ${operation} after ${attempts} attempts: ${lastReason}`);
  }
}

export class ClusterStartError extends HarnessError {
  readonly kind = 'ClusterStartError';

  constructor(
    public readonly version: string,
    cause: unknown,
  ) {
    super(`cluster failed to start at version ${version}: ${describeCause(cause)}`, { cause });
  }
}

export class RollingUpdateError extends HarnessError {
  readonly kind = 'RollingUpdateError';

  constructor(
    public readonly nodeIndex: number,
    public readonly targetVersion: string,
    public readonly cluster: Cluster,
    cause: unknown,
  ) {
    super(
      `node ${nodeIndex} failed to rejoin at version ${targetVersion}: ${describeCause(cause)}`,
      { cause },
    );
  }
}

export class SchemaError extends HarnessError {
  readonly kind = 'SchemaError';

  constructor(
    public readonly className: string,
    cause: unknown,
  ) {
    super(`failed to create class ${className}: ${describeCause(cause)}`, { cause });
  }
}

export class ImportError extends HarnessError {
  readonly kind = 'ImportError';

  constructor(
    public readonly version: string,
    cause: unknown,
  ) {
    super(`failed to import object for version ${version}: ${describeCause(cause)}`, { cause });
  }
}

export class DataLossError extends HarnessError {
  readonly kind = 'DataLossError';

  constructor(
    public readonly version: string,
    public readonly detail: string,
  ) {
    super(`object for version ${version} is missing or changed: ${detail}`);
  }
}

export class AggregateMismatchError extends HarnessError {
  readonly kind = 'AggregateMismatchError';

  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`aggregation: wanted ${expected}, got ${actual}`);
  }
}

export class DataServiceError extends HarnessError {
  readonly kind = 'DataServiceError';

  constructor(
    message: string,
    public readonly status: number | null,
  ) {
    super(message);
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function errorKind(error: unknown): string {
  if (error instanceof HarnessError) {
    return error.kind;
  }
  return error instanceof Error ? error.name : 'UnknownError';
}
