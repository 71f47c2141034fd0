// Typed failures surfaced by the fetcher, the salary loaders and the CLIs.

export class DataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad caller input: season labels, site names, config values. */
export class ValidationError extends DataError {}

export class FetchError extends DataError {
  readonly attempts: number;
  readonly status: number | null;

  constructor(
    message: string,
    opts: { attempts: number; status?: number | null; cause?: unknown }
  ) {
    super(message, { cause: opts.cause });
    this.attempts = opts.attempts;
    this.status = opts.status ?? null;
  }
}

export class SchemaError extends DataError {
  readonly missing: string[];

  constructor(message: string, missing: string[]) {
    super(message);
    this.missing = missing;
  }
}

export class UnknownFormatError extends DataError {
  readonly header: string[];

  constructor(message: string, header: string[]) {
    super(message);
    this.header = header;
  }
}

export class ParseError extends DataError {
  readonly row: number;
  readonly column: string;
  readonly value: unknown;

  constructor(message: string, opts: { row: number; column: string; value: unknown }) {
    super(message);
    this.row = opts.row;
    this.column = opts.column;
    this.value = opts.value;
  }
}

export class EmptyResultError extends DataError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
