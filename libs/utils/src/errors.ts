/**
 * Error types for branding hooks
 *
 * ConfigurationError and LookupError are recoverable: callers log them and
 * continue with an empty icon set. HookNotInstalledError marks a lifecycle
 * ordering bug and is always propagated. EntryStateError reports that the
 * stored entry changed before a queued lifecycle step ran.
 */

import type { FlowAbortReason } from '@branding/types';

/**
 * Base class so callers can tell branding errors apart from anything else
 */
export class BrandingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The configured icon folder is missing or not under the public prefix */
export class ConfigurationError extends BrandingError {
  constructor(
    message: string,
    public readonly value?: string
  ) {
    super(message);
  }
}

/** The icon directory could not be enumerated */
export class LookupError extends BrandingError {
  constructor(
    message: string,
    public readonly directory: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** removeRewrite() was called before any installRewrite() */
export class HookNotInstalledError extends BrandingError {
  constructor() {
    super('Branding hooks were never installed; nothing to restore');
  }
}

/** A config flow field failed validation */
export class ValidationError extends BrandingError {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
  }
}

/** The entry already exists, or no longer exists, when a lifecycle step runs */
export class EntryStateError extends BrandingError {
  constructor(
    message: string,
    public readonly reason: FlowAbortReason
  ) {
    super(message);
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check whether an error is a Node.js system error with the given code
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}
