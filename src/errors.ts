export class MigratorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The input root cannot be scanned. Fatal before any file is read.
 */
export class PathError extends MigratorError {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class NotFoundError extends PathError {
  constructor(path: string, options?: { cause?: unknown }) {
    super(`Input directory not found: ${path}`, path, options);
  }
}

export class NotADirectoryError extends PathError {
  constructor(path: string) {
    super(`Input path is not a directory: ${path}`, path);
  }
}

export class WriteError extends MigratorError {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to write ${path}${reason}`, options);
  }
}

export class SchemaLoadError extends MigratorError {
  constructor(
    readonly path: string,
    problem: string,
    options?: { cause?: unknown },
  ) {
    super(`Schema ${path} ${problem}`, options);
  }
}

export class InterruptedError extends MigratorError {
  constructor() {
    super('Migration interrupted');
  }
}

/**
 * Read a string error code (ENOENT, EACCES, ...) off a Node.js system error.
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
