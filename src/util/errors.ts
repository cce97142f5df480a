export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Reading a module (or the scan root) failed. Fatal for the run. */
export class ModuleReadError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`cannot read ${path}: ${formatError(cause)}`, { cause });
    this.name = "ModuleReadError";
    this.path = path;
  }
}

/** Throw a TypeError unless `content` is a string. */
export function assertText(content: unknown, what: string): asserts content is string {
  if (typeof content !== "string") {
    const kind = content === null ? "null" : Array.isArray(content) ? "array" : typeof content;
    throw new TypeError(`${what}: expected string content but got ${kind}`);
  }
}
