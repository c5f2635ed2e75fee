// src/core/extract/precedence.ts

/** One candidate in a precedence list. The first rule that applies wins. */
export interface PrecedenceRule<I, O> {
  readonly source: string;
  applies(input: I): boolean;
  extract(input: I): O;
}

export function firstMatch<I, O>(rules: readonly PrecedenceRule<I, O>[], input: I): O | undefined {
  for (const rule of rules) {
    if (rule.applies(input)) {
      return rule.extract(input);
    }
  }
  return undefined;
}
