export class StoreUnavailableError extends Error {
  readonly dbPath: string;

  constructor(dbPath: string, cause: unknown) {
    super(`Unable to open event store at ${dbPath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'StoreUnavailableError';
    this.dbPath = dbPath;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
