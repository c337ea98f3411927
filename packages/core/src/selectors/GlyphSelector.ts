/**
 * GlyphSelector - a parsed reference to one or more glyphs
 *
 * Forms: bare glyph name, `@class`, `/regex/`, `U+0041`, `U+0030=>U+0039`
 * and inline classes `[a @b U+0063]`, each optionally followed by suffix
 * operations (`.sc` appends a suffix, `~sc` strips it).
 */

import { formatLocation, type FontModel, type SourceLocation } from '@layoutforge/types';
import {
  MissingGlyphWarning,
  ResolutionError,
  UndefinedReferenceError,
  type ErrorContext,
} from '../errors/LayoutError.js';

export type InlineMember =
  | { kind: 'barename'; name: string }
  | { kind: 'classname'; name: string }
  | { kind: 'unicodeglyph'; codepoint: number };

export type SelectorBody =
  | InlineMember
  | { kind: 'regex'; pattern: string }
  | { kind: 'unicoderange'; start: number; end: number }
  | { kind: 'inlineclass'; members: InlineMember[] };

export interface GlyphSuffix {
  operation: 'append' | 'strip';
  suffix: string;
}

/**
 * What a selector resolves against.
 */
export interface SelectorScope {
  font: FontModel;
  namedClasses: ReadonlyMap<string, readonly string[]>;
  /** Missing glyphs raise instead of warning */
  strict?: boolean;
  onWarning?(warning: MissingGlyphWarning): void;
}

export interface ResolveOptions {
  /** Check the result against the font's exported glyphs (default true) */
  mustExist?: boolean;
}

export function codepointText(codepoint: number): string {
  return `U+${codepoint.toString(16).toUpperCase().padStart(4, '0')}`;
}

function memberText(member: SelectorBody): string {
  switch (member.kind) {
    case 'barename':
      return member.name;
    case 'classname':
      return `@${member.name}`;
    case 'regex':
      return `/${member.pattern}/`;
    case 'unicodeglyph':
      return codepointText(member.codepoint);
    case 'unicoderange':
      return `${codepointText(member.start)}=>${codepointText(member.end)}`;
    case 'inlineclass':
      return `[${member.members.map(memberText).join(' ')}]`;
  }
}

function applySuffix(glyph: string, suffix: GlyphSuffix): string {
  if (suffix.operation === 'append') {
    return `${glyph}.${suffix.suffix}`;
  }
  const tail = `.${suffix.suffix}`;
  return glyph.endsWith(tail) ? glyph.slice(0, -tail.length) : glyph;
}

export class GlyphSelector {
  constructor(
    readonly body: SelectorBody,
    readonly suffixes: readonly GlyphSuffix[] = [],
    readonly location?: SourceLocation
  ) {}

  /**
   * Source-like rendering, used in messages and debug output.
   */
  asText(): string {
    const suffixes = this.suffixes.map(s => (s.operation === 'append' ? `.${s.suffix}` : `~${s.suffix}`));
    return memberText(this.body) + suffixes.join('');
  }

  /**
   * Expand to an ordered list of glyph names.
   *
   * A top-level bare name is returned as written without consulting the
   * font. Other forms are checked against the exported glyphs unless
   * `mustExist` is false: missing names are dropped with a warning, or
   * raise in strict mode.
   */
  resolve(scope: SelectorScope, options: ResolveOptions = {}): string[] {
    const mustExist = options.mustExist ?? true;
    let glyphs = this.expand(this.body, scope);
    for (const suffix of this.suffixes) {
      glyphs = glyphs.map(glyph => applySuffix(glyph, suffix));
    }

    if (!mustExist || this.body.kind === 'barename') {
      return glyphs;
    }

    const exported = new Set(scope.font.exportedGlyphs());
    const missing = glyphs.filter(glyph => !exported.has(glyph));
    if (missing.length === 0) {
      return glyphs;
    }

    const warning = new MissingGlyphWarning(missing, this.asText(), this.where(), this.errorContext());
    if (scope.strict) {
      throw new ResolutionError(warning.message, 'ERR_MISSING_GLYPH', this.errorContext());
    }
    scope.onWarning?.(warning);
    return glyphs.filter(glyph => exported.has(glyph));
  }

  private expand(body: SelectorBody, scope: SelectorScope): string[] {
    switch (body.kind) {
      case 'barename':
        return [body.name];

      case 'classname': {
        const members = scope.namedClasses.get(body.name);
        if (!members) {
          throw new UndefinedReferenceError(
            `Tried to expand glyph class '@${body.name}' but @${body.name} was not defined (at ${this.where()})`,
            'class',
            body.name,
            this.errorContext(),
            'Define the class with DefineClass before using it'
          );
        }
        return [...members];
      }

      case 'regex': {
        let pattern: RegExp;
        try {
          pattern = new RegExp(body.pattern);
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          throw new ResolutionError(
            `Invalid regular expression /${body.pattern}/: ${reason} (at ${this.where()})`,
            'ERR_INVALID_REGEX',
            this.errorContext()
          );
        }
        return scope.font.exportedGlyphs().filter(glyph => pattern.test(glyph));
      }

      case 'unicodeglyph':
        return [this.glyphForCodepoint(body.codepoint, scope)];

      case 'unicoderange': {
        const glyphs: string[] = [];
        for (let codepoint = body.start; codepoint <= body.end; codepoint++) {
          glyphs.push(this.glyphForCodepoint(codepoint, scope));
        }
        return glyphs;
      }

      case 'inlineclass':
        return body.members.flatMap(member => this.expand(member, scope));
    }
  }

  private glyphForCodepoint(codepoint: number, scope: SelectorScope): string {
    const glyph = scope.font.glyphForCodepoint(codepoint);
    if (glyph === undefined) {
      throw new ResolutionError(
        `Font does not contain glyph for ${codepointText(codepoint)} (at ${this.where()})`,
        'ERR_MISSING_CODEPOINT',
        this.errorContext()
      );
    }
    return glyph;
  }

  private where(): string {
    return this.location ? formatLocation(this.location) : 'unknown location';
  }

  private errorContext(): ErrorContext {
    return this.location
      ? { file: this.location.file, line: this.location.line, column: this.location.column, selector: this.asText() }
      : { selector: this.asText() };
  }
}
