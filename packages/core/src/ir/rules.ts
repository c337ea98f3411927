/**
 * Rule variants of the IR.
 *
 * Every rule works on glyph classes: one class (list of glyph names) per
 * position. Context classes surround the positions a rule acts on.
 */

import type { AnchorPoint, LanguageSystem, ValueRecord } from '@layoutforge/types';
import type { Routine } from './Routine.js';

/** Glyphs accepted at one position */
export type GlyphClass = readonly string[];

interface RuleBase {
  precontext: GlyphClass[];
  postcontext: GlyphClass[];
  languages: LanguageSystem[];
  /** Lookup flags, set from the enclosing routine when it is closed */
  flags: number;
  /** Source address, `file:line:column` */
  address?: string;
}

export interface SubstitutionRule extends RuleBase {
  kind: 'substitution';
  input: GlyphClass[];
  replacement: GlyphClass[];
}

export interface PositioningRule extends RuleBase {
  kind: 'positioning';
  glyphs: GlyphClass[];
  /** Parallel to `glyphs`; undefined leaves that position untouched */
  valueRecords: (ValueRecord | undefined)[];
}

export interface ChainingRule extends RuleBase {
  kind: 'chaining';
  input: GlyphClass[];
  /** Parallel to `input`: routines applied at each position */
  lookups: Routine[][];
}

export interface AttachmentRule extends RuleBase {
  kind: 'attachment';
  baseAnchor: string;
  markAnchor: string;
  bases: Record<string, AnchorPoint>;
  marks: Record<string, AnchorPoint>;
}

export type Rule = SubstitutionRule | PositioningRule | ChainingRule | AttachmentRule;

export type RuleKind = Rule['kind'];

type Context = Partial<Pick<RuleBase, 'precontext' | 'postcontext' | 'languages' | 'address'>>;

function base(context: Context): RuleBase {
  return {
    precontext: context.precontext ?? [],
    postcontext: context.postcontext ?? [],
    languages: context.languages ?? [],
    flags: 0,
    address: context.address,
  };
}

export function substitution(input: GlyphClass[], replacement: GlyphClass[], context: Context = {}): SubstitutionRule {
  return { kind: 'substitution', input, replacement, ...base(context) };
}

export function positioning(glyphs: GlyphClass[], valueRecords: (ValueRecord | undefined)[], context: Context = {}): PositioningRule {
  return { kind: 'positioning', glyphs, valueRecords, ...base(context) };
}

export function chaining(input: GlyphClass[], lookups: Routine[][], context: Context = {}): ChainingRule {
  return { kind: 'chaining', input, lookups, ...base(context) };
}

export function attachment(
  baseAnchor: string,
  markAnchor: string,
  bases: Record<string, AnchorPoint>,
  marks: Record<string, AnchorPoint>,
  context: Context = {}
): AttachmentRule {
  return { kind: 'attachment', baseAnchor, markAnchor, bases, marks, ...base(context) };
}

// === TEXT FORM ===

function classText(glyphClass: GlyphClass): string {
  return glyphClass.length === 1 ? glyphClass[0] : `[${glyphClass.join(' ')}]`;
}

function sequenceText(classes: GlyphClass[]): string {
  return classes.map(classText).join(' ');
}

function valueRecordText(record: ValueRecord): string {
  const { xPlacement = 0, yPlacement = 0, xAdvance = 0, yAdvance = 0 } = record;
  return `<${xPlacement} ${yPlacement} ${xAdvance} ${yAdvance}>`;
}

function withContext(rule: RuleBase, middle: string): string {
  const parts: string[] = [];
  if (rule.precontext.length > 0) parts.push(sequenceText(rule.precontext));
  parts.push(rule.precontext.length > 0 || rule.postcontext.length > 0 ? `( ${middle} )` : middle);
  if (rule.postcontext.length > 0) parts.push(sequenceText(rule.postcontext));
  return parts.join(' ');
}

/**
 * One-line rendering used by the CLI and debug output.
 *
 * `sub f i -> f_i`, `pos A <0 0 -20 0>`, `chain ( A ^kern )`, `attach top _top A acutecomb`
 */
export function describeRule(rule: Rule): string {
  switch (rule.kind) {
    case 'substitution':
      return `sub ${withContext(rule, sequenceText(rule.input))} -> ${sequenceText(rule.replacement)}`;
    case 'positioning': {
      const items = rule.glyphs.map((glyphClass, i) => {
        const record = rule.valueRecords[i];
        return record ? `${classText(glyphClass)} ${valueRecordText(record)}` : classText(glyphClass);
      });
      return `pos ${withContext(rule, items.join(' '))}`;
    }
    case 'chaining': {
      const items = rule.input.map((glyphClass, i) => {
        const refs = (rule.lookups[i] ?? []).map(r => `^${r.name ?? '<anonymous>'}`);
        return [classText(glyphClass), ...refs].join(' ');
      });
      return `chain ${withContext(rule, items.join(' '))}`;
    }
    case 'attachment':
      return `attach ${rule.baseAnchor} ${rule.markAnchor} ${classText(Object.keys(rule.bases))} ${classText(Object.keys(rule.marks))}`;
  }
}
