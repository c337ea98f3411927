import { formatLocation, type SourceLocation, type ValueRecord } from '@layoutforge/types';
import { UndefinedReferenceError } from '../errors/LayoutError.js';
import { Routine, type RoutineJSON } from './Routine.js';

/** Value bound by `Set $name = ...` */
export type VariableValue = number | ValueRecord;

export interface FontFeaturesJSON {
  classes: Record<string, string[]>;
  routines: RoutineJSON[];
  features: Record<string, (string | number)[]>;
}

/**
 * Root of the IR: named classes, variables, routines and features.
 *
 * A compilation session owns exactly one instance and mutates it in
 * statement order.
 */
export class FontFeatures {
  readonly namedClasses = new Map<string, string[]>();
  readonly variables = new Map<string, VariableValue>();
  readonly routines: Routine[] = [];
  readonly features = new Map<string, Routine[]>();

  defineClass(name: string, glyphs: readonly string[]): void {
    this.namedClasses.set(name, [...glyphs]);
  }

  /**
   * Register a routine in the routine list (idempotent).
   */
  addRoutine(routine: Routine): Routine {
    if (!this.routines.includes(routine)) {
      this.routines.push(routine);
    }
    return routine;
  }

  /**
   * Append routine references to a feature tag. Routines are registered
   * too; the feature holds the same objects, not copies.
   */
  addFeature(tag: string, routines: readonly Routine[]): void {
    const existing = this.features.get(tag) ?? [];
    for (const routine of routines) {
      this.addRoutine(routine);
      existing.push(routine);
    }
    this.features.set(tag, existing);
  }

  /**
   * Most recently registered routine with this name.
   */
  routineNamed(name: string): Routine | undefined {
    for (let i = this.routines.length - 1; i >= 0; i--) {
      if (this.routines[i].name === name) {
        return this.routines[i];
      }
    }
    return undefined;
  }

  /**
   * Routine for a `^name` reference. Throws when no routine has the name.
   */
  referenceRoutine(name: string, location?: SourceLocation): Routine {
    const routine = this.routineNamed(name);
    if (!routine) {
      const where = location ? ` (at ${formatLocation(location)})` : '';
      throw new UndefinedReferenceError(
        `Routine '${name}' was not defined${where}`,
        'routine',
        name,
        location ? { file: location.file, line: location.line, column: location.column } : {},
        'Define the routine with Routine name { ... }; before referencing it'
      );
    }
    return routine;
  }

  /**
   * Features reference routines by name, or by index in `routines` when
   * the routine is anonymous.
   */
  toJSON(): FontFeaturesJSON {
    const features: Record<string, (string | number)[]> = {};
    for (const [tag, routines] of this.features) {
      features[tag] = routines.map(r => r.name ?? this.routines.indexOf(r));
    }
    return {
      classes: Object.fromEntries(this.namedClasses),
      routines: this.routines.map(r => r.toJSON()),
      features,
    };
  }
}
