// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Typed error hierarchy for novelseek. */

export class NovelSeekError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NovelSeekError";
  }
}

export class ConfigurationError extends NovelSeekError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A single source failed to produce results. Never escapes the dispatcher. */
export class SourceSearchError extends NovelSeekError {
  constructor(
    public readonly sourceId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Source '${sourceId}' search failed: ${message}`, options);
    this.name = "SourceSearchError";
  }
}

export class SourceTimeoutError extends SourceSearchError {
  constructor(
    sourceId: string,
    public readonly timeoutMs: number,
  ) {
    super(sourceId, `timed out after ${timeoutMs}ms`);
    this.name = "SourceTimeoutError";
  }
}

export class MalformedHitError extends SourceSearchError {
  constructor(sourceId: string, detail: string) {
    super(sourceId, `malformed hit (${detail})`);
    this.name = "MalformedHitError";
  }
}

/** Render any thrown value as a one-line reason. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
