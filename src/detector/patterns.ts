import { DetectionError } from "../errors.js";

export interface PatternDefinition {
  category: string;
  source: string;
  flags?: string;
}

export interface CompiledPattern {
  category: string;
  regex: RegExp;
}

/** Fixed PII table. Categories double as the reported match category. */
export const PII_PATTERNS: readonly PatternDefinition[] = [
  { category: "SSN", source: String.raw`\d{3}-\d{2}-\d{4}` },
  { category: "Credit Card", source: String.raw`\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}` },
  { category: "Email", source: String.raw`\w+@\w+\.\w+` },
  { category: "Phone", source: String.raw`\(?\d{3}\)?[\s-]?\d{3}[\s-]?\d{4}` },
  { category: "IP Address", source: String.raw`\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}` },
  // £4,000 / $50 / € 100
  { category: "Currency", source: String.raw`[£$€]\s?\d[\d,.]*` },
  { category: "Money Words", source: String.raw`\d[\d,.]*\s*(pounds?|dollars?|euros?|quid|grand|k\b)` },
];

/**
 * Compiles pattern definitions with the global flag. A definition that does not
 * compile is logged and left out; it never fails the whole table.
 */
export function compilePatterns(definitions: readonly PatternDefinition[]): CompiledPattern[] {
  const compiled: CompiledPattern[] = [];

  for (const definition of definitions) {
    const flags = definition.flags?.includes("g") ? definition.flags : `${definition.flags ?? ""}g`;
    try {
      compiled.push({ category: definition.category, regex: new RegExp(definition.source, flags) });
    } catch (err) {
      const error = new DetectionError(definition.category, err);
      console.error(`[privacy-ledger] ${error.message} (skipped)`);
    }
  }

  return compiled;
}

export const DEFAULT_PATTERNS: readonly CompiledPattern[] = compilePatterns(PII_PATTERNS);
