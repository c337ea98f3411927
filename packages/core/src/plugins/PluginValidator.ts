/**
 * Structural checks for plugin modules.
 *
 * Custom plugins arrive as untyped module exports, so registration checks
 * their shape before composing any grammar.
 */

import type { RulePlugin } from './types.js';

const VERB_NAME = /^[A-Z][A-Za-z0-9_]+$/;

const OPTIONAL_FRAGMENTS = ['grammar', 'beforeBraceGrammar', 'afterBraceGrammar'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function verbProblems(verb: unknown, index: number): string[] {
  if (!isRecord(verb)) {
    return [`verbs[${index}] must be an object`];
  }
  const problems: string[] = [];
  const label = typeof verb.name === 'string' ? `verb '${verb.name}'` : `verbs[${index}]`;
  if (typeof verb.name !== 'string' || !VERB_NAME.test(verb.name)) {
    problems.push(`${label} needs a name starting with an uppercase letter`);
  }
  if (typeof verb.transformer !== 'function') {
    problems.push(`${label} needs a transformer factory`);
  }
  for (const fragment of OPTIONAL_FRAGMENTS) {
    if (verb[fragment] !== undefined && typeof verb[fragment] !== 'function') {
      problems.push(`${label}.${fragment} must be a function`);
    }
  }
  return problems;
}

/**
 * Everything wrong with a candidate plugin; empty when it is usable.
 */
export function pluginProblems(candidate: unknown): string[] {
  if (!isRecord(candidate)) {
    return ['plugin must be an object'];
  }
  const problems: string[] = [];
  if (typeof candidate.name !== 'string' || candidate.name.trim() === '') {
    problems.push('name must be a non-empty string');
  }
  if (!isRecord(candidate.options) || typeof candidate.options.useHelpers !== 'boolean') {
    problems.push('options.useHelpers must be a boolean');
  }
  if (typeof candidate.grammar !== 'function') {
    problems.push('grammar must be a function');
  }
  if (candidate.tokens !== undefined && !Array.isArray(candidate.tokens)) {
    problems.push('tokens must be an array of token types');
  }
  if (!Array.isArray(candidate.verbs) || candidate.verbs.length === 0) {
    problems.push('verbs must be a non-empty array');
  } else {
    candidate.verbs.forEach((verb: unknown, i: number) => problems.push(...verbProblems(verb, i)));
  }
  return problems;
}

export function isRulePlugin(candidate: unknown): candidate is RulePlugin {
  return pluginProblems(candidate).length === 0;
}

/**
 * Display name of a candidate, valid or not.
 */
export function pluginLabel(candidate: unknown): string {
  return isRecord(candidate) && typeof candidate.name === 'string' ? candidate.name : '<unnamed plugin>';
}
