/**
 * Error taxonomy. Only RuleLoadError and HostConnectionError are meant to
 * escape the engine; everything else is recovered and reported as data.
 */

/** The rule or drill catalog is missing or malformed. Fatal. */
export class RuleLoadError extends Error {
  override name = 'RuleLoadError';

  constructor(message: string, readonly source: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The CAD host answered, but reported a failure. */
export class HostError extends Error {
  override name = 'HostError';

  constructor(message: string, readonly endpoint?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The CAD host could not be reached at all, after retries. */
export class HostConnectionError extends HostError {
  override name = 'HostConnectionError';
}

/** A feature reference outlived the geometry generation it was issued in. */
export class StaleReferenceError extends Error {
  override name = 'StaleReferenceError';

  constructor(readonly feature: string, readonly issued: number, readonly current: number) {
    super(
      `Feature "${feature}" was issued in geometry generation ${issued}, ` +
      `current generation is ${current}. Re-analyze the part to get fresh references.`
    );
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
