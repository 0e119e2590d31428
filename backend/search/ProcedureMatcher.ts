// Procedure Matcher
//
// Expands a procedure query (MS-DRG code or free text) into text-match
// conditions over procedure descriptions. Conditions are OR-combined by the
// repository. All matching is case-insensitive.

export type ProcedureCondition =
  | Readonly<{ kind: "startsWith"; value: string }>
  | Readonly<{ kind: "contains"; value: string }>
  // Whole-token match anywhere in the description (used for DRG codes).
  | Readonly<{ kind: "word"; value: string }>;

const MIN_TOKEN_LENGTH = 3;
const PREFIX_TOKEN_MIN_LENGTH = 5;

export function isNumericCode(query: string): boolean {
  return /^\d+$/.test(query.trim());
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9&/\-\s]/g, " ")
    .split(/\s+/)
    .map((t) => t.replace(/^[-/&]+|[-/&]+$/g, ""))
    .filter(Boolean);
}

// Tolerates partial or misspelled terms ("pneumona" -> "pneum").
export function truncatedPrefix(token: string): string {
  return token.slice(0, Math.max(4, token.length - 3));
}

export function buildProcedureConditions(
  query: string,
  synonyms: ReadonlyMap<string, readonly string[]>,
): ProcedureCondition[] {
  const trimmed = query.trim();
  if (!trimmed) return [];

  const out: ProcedureCondition[] = [];
  const seen = new Set<string>();
  const add = (c: ProcedureCondition) => {
    const key = `${c.kind}:${c.value}`;
    if (seen.has(key)) return;
    seen.add(key);
    out.push(c);
  };

  if (isNumericCode(trimmed)) {
    // A delimiter must follow the code: "470" must not hit "4700 - ...".
    add({ kind: "startsWith", value: `${trimmed} ` });
    add({ kind: "startsWith", value: `${trimmed}-` });
    add({ kind: "word", value: trimmed });
    return out;
  }

  const tokens = tokenize(trimmed).filter((t) => t.length >= MIN_TOKEN_LENGTH);
  if (!tokens.length) {
    add({ kind: "contains", value: trimmed.toLowerCase() });
    return out;
  }

  for (const token of tokens) {
    add({ kind: "contains", value: token });
    for (const s of synonyms.get(token) ?? []) add({ kind: "contains", value: s });
    if (token.length >= PREFIX_TOKEN_MIN_LENGTH) add({ kind: "contains", value: truncatedPrefix(token) });
  }

  return out;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function matchesCondition(description: string, condition: ProcedureCondition): boolean {
  const text = description.toLowerCase();
  const value = condition.value.toLowerCase();
  switch (condition.kind) {
    case "startsWith":
      return text.startsWith(value);
    case "contains":
      return text.includes(value);
    case "word":
      return new RegExp(`(^|[^a-z0-9])${escapeRegExp(value)}($|[^a-z0-9])`).test(text);
    default: {
      const _exhaustiveCheck: never = condition;
      throw new Error(`Unhandled condition: ${JSON.stringify(_exhaustiveCheck)}`);
    }
  }
}

export function matchesAny(description: string, conditions: readonly ProcedureCondition[]): boolean {
  return conditions.some((c) => matchesCondition(description, c));
}
