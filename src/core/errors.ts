/**
 * Connector error taxonomy
 *
 * Lower-level failures are wrapped into one of these kinds and carried
 * through `Result` values. Public operations never let them escape; they
 * log and return a boolean or an empty result instead.
 */

export type ErrorKind = 'discovery' | 'connection' | 'protocol' | 'config-incomplete' | 'storage';

export abstract class ConnectorError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Scan failure. Non-fatal: discovery returns an empty result. */
export class DiscoveryError extends ConnectorError {
  readonly kind = 'discovery' as const;
}

/** Timeout or transport rejection during connect/pair. */
export class ConnectionError extends ConnectorError {
  readonly kind = 'connection' as const;
}

/** Unexpected, malformed or missing command response. */
export class ProtocolError extends ConnectorError {
  readonly kind = 'protocol' as const;
}

/** Saved addresses missing from the store. */
export class ConfigIncompleteError extends ConnectorError {
  readonly kind = 'config-incomplete' as const;
}

/** The store could not be written. */
export class StorageError extends ConnectorError {
  readonly kind = 'storage' as const;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ConnectorError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: ConnectorError): Result<T> {
  return { ok: false, error };
}

const ERROR_CLASSES = {
  discovery: DiscoveryError,
  connection: ConnectionError,
  protocol: ProtocolError,
  'config-incomplete': ConfigIncompleteError,
  storage: StorageError,
} satisfies Record<ErrorKind, new (message: string, options?: { cause?: unknown }) => ConnectorError>;

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Wrap an arbitrary thrown value. Connector errors pass through untouched.
 */
export function toConnectorError(kind: ErrorKind, err: unknown): ConnectorError {
  if (err instanceof ConnectorError) return err;
  const ErrorClass = ERROR_CLASSES[kind];
  return new ErrorClass(describeError(err), { cause: err });
}

/**
 * Run an async step, capturing any throw as a failed Result.
 */
export async function attempt<T>(kind: ErrorKind, step: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await step());
  } catch (err) {
    return fail(toConnectorError(kind, err));
  }
}

/**
 * Reject with a ConnectionError if `promise` does not settle within `ms`.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ConnectionError(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
