export class SourceUnavailableError extends Error {
  constructor(
    readonly command: string,
    readonly detail: string,
  ) {
    super(detail ? `\`${command}\` failed: ${detail}` : `\`${command}\` failed`);
    this.name = "SourceUnavailableError";
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class GridInvariantError extends Error {
  constructor(
    readonly year: number,
    message: string,
  ) {
    super(`${year}: ${message}`);
    this.name = "GridInvariantError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
