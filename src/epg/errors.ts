export class EpgError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends EpgError {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ParseError extends EpgError {}

export class MergeError extends EpgError {}

export class SinkError extends EpgError {
  constructor(public readonly path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConfigError extends EpgError {}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
