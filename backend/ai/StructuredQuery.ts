import { z } from "zod";
import { INTENTS, type Intent } from "../domain/Intent";
import { toValidationIssues } from "../validation/schemas";
import { stableJsonStringify, strictParseJsonObject } from "./PromptBuilders";
import type { QuestionHints } from "./QuestionHints";

// Structured query: the only shape an LLM may ask the store for.
// Filters are a closed set of tagged variants; there is no free-form text
// that reaches the database as code.

export const DEFAULT_QUERY_LIMIT = 10;
export const DEFAULT_QUERY_RADIUS_KM = 50;

const FilterSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("procedure"),
    terms: z.array(z.string().trim().min(1).max(100)).min(1).max(10),
  }),
  z.object({ type: z.literal("zip_prefix"), value: z.string().regex(/^\d{2,5}$/) }),
  z.object({ type: z.literal("city"), value: z.string().trim().min(1).max(80) }),
  z.object({ type: z.literal("state"), value: z.string().regex(/^[A-Za-z]{2}$/) }),
  z.object({
    type: z.literal("radius"),
    zip: z.string().regex(/^\d{5}$/),
    radiusKm: z.number().positive().max(500),
  }),
  // Distances from this ZIP without a radius cut.
  z.object({ type: z.literal("origin"), zip: z.string().regex(/^\d{5}$/) }),
]);

export const StructuredQuerySchema = z
  .object({
    filters: z.array(FilterSchema).max(8),
    order: z.enum(INTENTS),
    limit: z.number().int().min(1).max(50).default(DEFAULT_QUERY_LIMIT),
  })
  .strict();

export type QueryFilter = z.infer<typeof FilterSchema>;
export type StructuredQuery = z.infer<typeof StructuredQuerySchema>;

export const MUTATION_VERBS = [
  "INSERT",
  "UPDATE",
  "DELETE",
  "DROP",
  "ALTER",
  "TRUNCATE",
  "CREATE",
  "GRANT",
  "REVOKE",
  "MERGE",
] as const;

const MUTATION_RE = new RegExp(`\\b(${MUTATION_VERBS.join("|")})\\b`, "i");

export function findMutationVerb(raw: string): string | undefined {
  return MUTATION_RE.exec(raw)?.[1].toUpperCase();
}

export type PlannedQuery =
  | Readonly<{ kind: "ok"; query: StructuredQuery }>
  // A mutation verb anywhere in the raw output; never executed.
  | Readonly<{ kind: "unsafe"; verb: string }>
  | Readonly<{ kind: "invalid"; reason: string }>;

export function parsePlannedQuery(raw: string): PlannedQuery {
  const verb = findMutationVerb(raw);
  if (verb) return { kind: "unsafe", verb };

  let obj: Record<string, unknown>;
  try {
    obj = strictParseJsonObject(raw);
  } catch (err) {
    return { kind: "invalid", reason: err instanceof Error ? err.message : String(err) };
  }

  const parsed = StructuredQuerySchema.safeParse(obj);
  if (!parsed.success) {
    const reason = toValidationIssues(parsed.error)
      .map((i) => `${i.path}: ${i.message}`)
      .join("; ");
    return { kind: "invalid", reason };
  }
  return { kind: "ok", query: parsed.data };
}

export function procedureTermsOf(hints: QuestionHints): string[] {
  return hints.drgCode ? [hints.drgCode, ...hints.procedureTerms] : [...hints.procedureTerms];
}

// Deterministic query from the extracted hints alone.
export function buildQueryFromHints(hints: QuestionHints, intent: Intent): StructuredQuery {
  const filters: QueryFilter[] = [];

  const terms = procedureTermsOf(hints);
  if (terms.length) filters.push({ type: "procedure", terms });

  if (hints.zipCode) {
    filters.push({ type: "radius", zip: hints.zipCode, radiusKm: hints.radiusKm ?? DEFAULT_QUERY_RADIUS_KM });
  } else if (hints.city) {
    filters.push({ type: "city", value: hints.city.city });
    filters.push({ type: "state", value: hints.city.state });
  }

  return { filters, order: intent, limit: DEFAULT_QUERY_LIMIT };
}

// The classified intent wins over the planner's order unless it is the default.
export function withIntentOrder(query: StructuredQuery, intent: Intent): StructuredQuery {
  return intent === "value" || query.order === intent ? query : { ...query, order: intent };
}

export function replaceGeography(query: StructuredQuery, geography: readonly QueryFilter[]): StructuredQuery {
  const kept = query.filters.filter((f) => f.type === "procedure");
  return { ...query, filters: [...kept, ...geography] };
}

export function describeQuery(query: StructuredQuery): string {
  return stableJsonStringify(query);
}
