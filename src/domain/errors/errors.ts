export class UnknownKeywordError extends Error {
  constructor(readonly keywordName: string) {
    super(`No keyword ${keywordName}`);
    this.name = "UnknownKeywordError";
  }
}

export class DetectorBuildError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DetectorBuildError";
  }
}

export class MalformedEventError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedEventError";
  }
}

export class TransportWriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportWriteError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
