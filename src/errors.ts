import type { Destination } from './types.js';

export class AirwavesError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Fatal at startup; carries every problem found, not just the first.
export class ConfigError extends AirwavesError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.issues = issues;
  }
}

export class FetchError extends AirwavesError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(`Failed to fetch ${url}: ${message}`, { cause: options?.cause });
    this.url = url;
    this.status = options?.status ?? null;
  }
}

export class ParseError extends AirwavesError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to parse calendar ${url}: ${message}`, options);
    this.url = url;
  }
}

export class FormatError extends AirwavesError {
  readonly destination: Destination;

  constructor(destination: Destination, message: string, options?: { cause?: unknown }) {
    super(`Failed to build ${destination} message: ${message}`, options);
    this.destination = destination;
  }
}

export class DeliveryError extends AirwavesError {
  readonly destination: Destination;
  readonly status: number | null;

  constructor(destination: Destination, message: string, options?: { status?: number; cause?: unknown }) {
    super(`Failed to deliver to ${destination}: ${message}`, { cause: options?.cause });
    this.destination = destination;
    this.status = options?.status ?? null;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
