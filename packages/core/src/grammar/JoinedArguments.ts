import type { SourceLocation } from '@layoutforge/types';

/**
 * A word of statement source with its position.
 */
export interface SourceWord {
  image: string;
  line: number;
  column: number;
}

/**
 * Verb arguments joined with single spaces for re-parsing by a verb
 * grammar. Offsets in the joined text map back to the line and column of
 * the word they came from.
 */
export class JoinedArguments {
  readonly text: string;
  private readonly starts: number[] = [];

  constructor(
    readonly words: readonly SourceWord[],
    readonly origin: SourceLocation
  ) {
    let text = '';
    for (const word of words) {
      if (text.length > 0) text += ' ';
      this.starts.push(text.length);
      text += word.image;
    }
    this.text = text;
  }

  get isEmpty(): boolean {
    return this.words.length === 0;
  }

  /**
   * Source location of a character offset in `text`. Offsets past the end
   * point just after the last word; anything unusable falls back to the
   * statement origin.
   */
  locate(offset: number): SourceLocation {
    if (!Number.isFinite(offset) || this.words.length === 0 || offset < 0) {
      return this.origin;
    }
    let index = 0;
    while (index + 1 < this.starts.length && this.starts[index + 1] <= offset) {
      index++;
    }
    const word = this.words[index];
    return {
      file: this.origin.file,
      line: word.line,
      column: word.column + (offset - this.starts[index]),
    };
  }
}
