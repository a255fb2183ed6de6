export class SylvanError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SylvanError';
  }
}

export class ForeignLocationError extends SylvanError {
  constructor(public readonly stash: string) {
    super(`Location is not held by stash "${stash}"`, 'FOREIGN_LOCATION');
    this.name = 'ForeignLocationError';
  }
}

export class RefCountUnderflowError extends SylvanError {
  constructor(public readonly stash: string) {
    super(`Reference count underflow in stash "${stash}"`, 'REFCOUNT_UNDERFLOW');
    this.name = 'RefCountUnderflowError';
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends SylvanError {
  constructor(message: string, public readonly issues: ConfigIssue[] = [], cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class DuplicateKeyError extends SylvanError {
  constructor(public readonly collection: string, public readonly key: unknown) {
    super(`Key ${String(key)} is already present in "${collection}"`, 'DUPLICATE_KEY');
    this.name = 'DuplicateKeyError';
  }
}

export class DisposedCollectionError extends SylvanError {
  constructor(public readonly collection: string) {
    super(`Collection "${collection}" was disposed`, 'DISPOSED');
    this.name = 'DisposedCollectionError';
  }
}
