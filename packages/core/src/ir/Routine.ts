import { lookupFlagNames } from '@layoutforge/types';
import { describeRule, type Rule } from './rules.js';

export interface RoutineOptions {
  name?: string;
  flags?: number;
  address?: string;
  rules?: Rule[];
}

export interface RoutineJSON {
  name?: string;
  address?: string;
  flags: string[];
  rules: string[];
}

/**
 * An ordered list of rules compiled as one lookup.
 *
 * Flags are stored on the routine while its body is being compiled and
 * copied onto every rule by `close()`.
 */
export class Routine {
  name?: string;
  flags: number;
  address?: string;
  readonly rules: Rule[];
  private closed = false;

  constructor(options: RoutineOptions = {}) {
    this.name = options.name;
    this.flags = options.flags ?? 0;
    this.address = options.address;
    this.rules = options.rules ? [...options.rules] : [];
  }

  addRule(rule: Rule): void {
    this.rules.push(rule);
    if (this.closed) {
      rule.flags = this.flags;
    }
  }

  /**
   * Apply the routine's flags to all contained rules. Rules added after
   * closing receive the flags immediately.
   */
  close(): this {
    for (const rule of this.rules) {
      rule.flags = this.flags;
    }
    this.closed = true;
    return this;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isEmpty(): boolean {
    return this.rules.length === 0;
  }

  toJSON(): RoutineJSON {
    return {
      name: this.name,
      address: this.address,
      flags: lookupFlagNames(this.flags),
      rules: this.rules.map(describeRule),
    };
  }
}
