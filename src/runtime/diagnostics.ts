import { Location, formatLocation } from '../lexer/tokens';

export interface DiagnosticEntry {
  location: Location;
  message: string;
  notes: string[];
}

/**
 * Accumulates errors tied to source locations, each followed by any number
 * of notes. Built fluently:
 *
 *   new Diagnostics()
 *     .error(loc, 'Unmatched closing parentheses!')
 *     .note(null, 'Delete it.')
 */
export class Diagnostics {
  private readonly entries: DiagnosticEntry[] = [];

  /** Start a new entry. */
  error(location: Location, message: string): this {
    this.entries.push({ location, message, notes: [] });
    return this;
  }

  /** Attach a note to the most recent entry. Ignored if there is none. */
  note(location: Location | null, text: string): this {
    const last = this.entries[this.entries.length - 1];
    if (last) {
      last.notes.push(location ? `NOTE: ${formatLocation(location)} - ${text}` : `NOTE: ${text}`);
    }
    return this;
  }

  /** Append every entry of `other`, in order. */
  extend(other: Diagnostics): this {
    this.entries.push(...other.entries);
    return this;
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  getEntries(): readonly DiagnosticEntry[] {
    return this.entries;
  }

  render(): string {
    return this.entries
      .map(entry => [`${formatLocation(entry.location)} - ${entry.message}`, ...entry.notes.map(n => `\t${n}`)].join('\n'))
      .join('\n');
  }

  toString(): string {
    return this.render();
  }
}
