/**
 * Layout primitives shared by the IR and the verb plugins
 */

// === VALUE RECORDS ===
export const VALUE_RECORD_FIELDS = ['xPlacement', 'yPlacement', 'xAdvance', 'yAdvance'] as const;

export type ValueRecordField = typeof VALUE_RECORD_FIELDS[number];

/** Positioning adjustment; absent fields are zero */
export type ValueRecord = Partial<Record<ValueRecordField, number>>;

export function isValueRecordField(name: string): name is ValueRecordField {
  return VALUE_RECORD_FIELDS.some(field => field === name);
}

// === LANGUAGE SYSTEMS ===
/** `*` in either slot matches any script or language */
export interface LanguageSystem {
  script: string;
  language: string;
}

// === LOOKUP FLAGS ===
export const LOOKUP_FLAGS = {
  RightToLeft: 1,
  IgnoreBases: 2,
  IgnoreLigatures: 4,
  IgnoreMarks: 8,
} as const;

export type LookupFlagName = keyof typeof LOOKUP_FLAGS;

export function isLookupFlagName(name: string): name is LookupFlagName {
  return Object.prototype.hasOwnProperty.call(LOOKUP_FLAGS, name);
}

export function lookupFlagNames(flags: number): LookupFlagName[] {
  const names: LookupFlagName[] = [];
  for (const name of Object.keys(LOOKUP_FLAGS)) {
    if (isLookupFlagName(name) && (flags & LOOKUP_FLAGS[name]) !== 0) {
      names.push(name);
    }
  }
  return names;
}

// === SOURCE LOCATIONS ===
export interface SourceLocation {
  file?: string;
  line: number;
  column: number;
}

export function formatLocation(location: SourceLocation): string {
  const position = `${location.line}:${location.column}`;
  return location.file ? `${location.file}:${position}` : position;
}
