/**
 * Error types
 */

/**
 * The filesystem could not produce an absolute path
 * Aborts building the link set of the whole document
 */
export class PathResolutionError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(`${message}: ${path}`, options);
    this.name = "PathResolutionError";
    this.path = path;
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
