/**
 * Error types raised by the sprig runtime.
 */

import { Location } from '../lexer/tokens';
import { Diagnostics } from './diagnostics';

/**
 * A user-facing failure: lexical, syntactic, type or runtime. Carries the
 * diagnostics it was raised with; `message` is their rendered form.
 */
export class SprigError extends Error {
  constructor(public readonly diagnostics: Diagnostics) {
    super(diagnostics.render());
    this.name = 'SprigError';
  }
}

/** Shorthand for a single error with optional location-free notes. */
export function sprigError(location: Location, message: string, ...notes: string[]): SprigError {
  const diagnostics = new Diagnostics().error(location, message);
  for (const note of notes) {
    diagnostics.note(null, note);
  }
  return new SprigError(diagnostics);
}

/**
 * A broken internal invariant. Never caused by user input.
 */
export class InternalError extends Error {
  constructor(message: string) {
    super(`${message} This is an internal error in sprig; please report it.`);
    this.name = 'InternalError';
  }
}
