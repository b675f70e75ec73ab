/**
 * Error taxonomy shared by the collectors, the archive writer and the
 * storage adapters
 */

/**
 * A collector could not produce its entries. Raised for failures that abort
 * the backup (project tree, database dump); per-file problems are skipped
 * before they get here.
 */
export class CollectorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CollectorError";
  }
}

/**
 * Tar header construction, compressor or archive file failure
 */
export class ArchiveFormatError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ArchiveFormatError";
  }
}

/**
 * A storage backend answered with a failure status, a body we could not
 * understand, or (for command-line backends) a non-zero exit.
 */
export class RemoteProtocolError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, options?: ErrorOptions & { status?: number }) {
    super(`${provider}: ${message}`, options);
    this.name = "RemoteProtocolError";
    this.provider = provider;
    this.status = options?.status;
  }
}

/**
 * Render an error and its `cause` chain as "outer: inner: root".
 */
export function formatErrorChain(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  const seen = new Set<unknown>();

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }

  return parts.join(": ");
}

/**
 * Node system error code (ENOENT, EACCES, ...) of an unknown thrown value
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
