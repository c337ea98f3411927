/**
 * Argument syntax nodes produced by the helper rules.
 *
 * Nodes that depend on session state (variables, glyph metrics, class
 * contents) are resolved by the verb transformer, not the grammar.
 */

import type { LanguageSystem, MetricName, SourceLocation, ValueRecordField } from '@layoutforge/types';

export type IntegerNode =
  | { kind: 'literal'; value: number }
  | { kind: 'variable'; name: string; location: SourceLocation }
  | { kind: 'glyphMetric'; metric: MetricName; glyph: string; location: SourceLocation };

export type ValueRecordNode =
  | { kind: 'fields'; fields: Partial<Record<ValueRecordField, IntegerNode>> }
  | { kind: 'variable'; name: string; location: SourceLocation };

/** `=` is accepted in source and stored as `==` */
export type Comparator = '<' | '<=' | '>' | '>=' | '==';

export interface MetricComparisonNode {
  metric: MetricName;
  comparator: Comparator;
  operand: IntegerNode;
  location: SourceLocation;
}

export type { LanguageSystem };
