import type { Intent } from "../domain/Intent";
import type { SearchResult } from "../domain/SearchResult";
import type { QuestionHints } from "./QuestionHints";

// This file builds deterministic, task-specific prompts from domain objects.
// Every completion is contract-bound to a JSON object; anything else is
// rejected by strictParseJsonObject and the caller takes its fallback path.

export type TaskName = "Provider Query Planning" | "Result Narration";

export interface PromptCall {
  readonly task: TaskName;
  readonly prompt: string;
  readonly system: string;
}

export const NARRATION_ROW_LIMIT = 5;
export const TEMPLATE_ROW_LIMIT = 3;

export function stableJsonStringify(value: unknown): string {
  // Deterministic JSON: sorts object keys recursively.
  // This keeps prompts stable and makes caching more predictable.
  const seen = new WeakSet<object>();

  const normalize = (v: unknown): unknown => {
    if (v === null || typeof v !== "object") return v;
    if (Array.isArray(v)) return v.map(normalize);

    if (seen.has(v)) {
      return "[CYCLE]";
    }
    seen.add(v);

    const entries = Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const out: Record<string, unknown> = {};
    for (const [k, val] of entries) out[k] = normalize(val);
    return out;
  };

  return JSON.stringify(normalize(value));
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stripCodeFences(raw: string): string {
  const fenced = /^\s*```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```\s*$/.exec(raw);
  return (fenced ? fenced[1] : raw).trim();
}

export function strictParseJsonObject(raw: string): Record<string, unknown> {
  // Enforces "no free-form chat" by refusing non-JSON outputs.
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(raw));
  } catch {
    throw new Error("LLM output was not valid JSON (rejected by contract).");
  }

  if (!isJsonObject(parsed)) throw new Error("LLM output must be a JSON object.");
  return parsed;
}

const STRUCTURED_QUERY_SCHEMA =
  "{\n" +
  '  "filters": [\n' +
  '    { "type": "procedure", "terms": [string, ...] }\n' +
  '    | { "type": "zip_prefix", "value": "2 to 5 digits" }\n' +
  '    | { "type": "city", "value": string }\n' +
  '    | { "type": "state", "value": "2-letter code" }\n' +
  '    | { "type": "radius", "zip": "5 digits", "radiusKm": number }\n' +
  '    | { "type": "origin", "zip": "5 digits" }\n' +
  "  ],\n" +
  '  "order": "cheapest"|"best_rated"|"nearest"|"value",\n' +
  '  "limit": integer 1-50\n' +
  "}";

const ORDER_GUIDANCE =
  "ORDER GUIDANCE:\n" +
  '- "cheapest": lowest average covered charges first.\n' +
  '- "best_rated": highest average patient rating first.\n' +
  '- "nearest": shortest distance first; needs a "radius" or "origin" filter to know the origin.\n' +
  '- "value": balanced cost, rating, distance and volume.\n';

export const PLANNING_SYSTEM_INSTRUCTIONS =
  "You translate questions about hospital costs and ratings into a JSON search request. " +
  "You never write SQL and never describe changes to data. Reply with one JSON object only.";

export const NARRATION_SYSTEM_INSTRUCTIONS =
  "You summarize hospital search results for a patient comparing costs. " +
  "Use only the numbers provided. Reply with one JSON object only.";

function hintsForPrompt(hints: QuestionHints): Record<string, unknown> {
  return {
    zipCode: hints.zipCode,
    city: hints.city ? { city: hints.city.city, state: hints.city.state } : undefined,
    radiusKm: hints.radiusKm,
    drgCode: hints.drgCode,
    procedureTerms: hints.procedureTerms,
  };
}

export function buildQueryPlanningPrompt(args: {
  readonly question: string;
  readonly hints: QuestionHints;
  readonly intent: Intent;
}): PromptCall {
  const payload = {
    question: args.question,
    hints: hintsForPrompt(args.hints),
    classifiedIntent: args.intent,
  };

  // Task-specific prompt. Do not reuse for other tasks.
  const prompt =
    "TASK: Provider Query Planning\n" +
    "ROLE: Convert the user's question into filters over a table of hospitals, " +
    "each with a procedure description (MS-DRG definition), city, state, ZIP code, " +
    "average charges and an average patient rating.\n" +
    "SAFETY RULES:\n" +
    "- NEVER output SQL.\n" +
    "- NEVER request inserts, updates or deletions of any data.\n" +
    "- NO medical advice.\n" +
    "OUTPUT RULES:\n" +
    "- Return ONLY valid JSON. No markdown. No extra keys beyond the schema.\n" +
    "- Prefer the extracted hints over guesses; a DRG code goes into procedure terms as-is.\n" +
    '- When a ZIP code is known, add a "radius" filter (default 50 km).\n\n' +
    ORDER_GUIDANCE +
    "\n" +
    "INPUT (question + extracted hints):\n" +
    stableJsonStringify(payload) +
    "\n\n" +
    "RETURN JSON SCHEMA:\n" +
    STRUCTURED_QUERY_SCHEMA;

  return { task: "Provider Query Planning", prompt, system: PLANNING_SYSTEM_INSTRUCTIONS };
}

function roundTo(n: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

export function sanitizeResultForAI(r: SearchResult): Record<string, unknown> {
  // Identifiers and score internals stay out of the prompt.
  return {
    rank: r.rank,
    providerName: r.providerName,
    city: r.providerCity,
    state: r.providerState,
    zipCode: r.providerZipCode,
    procedure: r.procedureDefinition,
    averageCoveredCharges: roundTo(r.averageCoveredCharges, 2),
    averageTotalPayments: roundTo(r.averageTotalPayments, 2),
    averageRating: r.averageRating === null ? null : roundTo(r.averageRating, 1),
    distanceKm: r.distanceKm === null ? null : roundTo(r.distanceKm, 1),
  };
}

export function buildResultNarrationPrompt(args: {
  readonly question: string;
  readonly intent: Intent;
  readonly results: readonly SearchResult[];
}): PromptCall {
  const payload = {
    question: args.question,
    intent: args.intent,
    results: args.results.slice(0, NARRATION_ROW_LIMIT).map(sanitizeResultForAI),
  };

  // Task-specific prompt. Do not reuse for other tasks.
  const prompt =
    "TASK: Result Narration\n" +
    "ROLE: Answer the question in 2-4 sentences using the ranked results below.\n" +
    "SAFETY RULES:\n" +
    "- NO medical advice.\n" +
    "- NO numbers that are not in the input.\n" +
    "- Mention that charges are averages, not quotes.\n" +
    "OUTPUT RULES:\n" +
    "- Return ONLY valid JSON. No markdown. No extra keys beyond the schema.\n\n" +
    "INPUT (question + ranked results):\n" +
    stableJsonStringify(payload) +
    "\n\n" +
    "RETURN JSON SCHEMA:\n" +
    "{\n" +
    '  "answer": string\n' +
    "}";

  return { task: "Result Narration", prompt, system: NARRATION_SYSTEM_INSTRUCTIONS };
}

// ---- Deterministic responses used when the completion service is unavailable ----

export const OUT_OF_SCOPE_MESSAGE =
  "I can only help with questions about hospital procedure costs, ratings and locations. " +
  'Try something like "cheapest knee replacement near 10001".';

export const UNSAFE_QUERY_MESSAGE =
  "That request could not be answered safely. Please rephrase it as a question about provider costs or ratings.";

const INTENT_LABELS: Readonly<Record<Intent, string>> = {
  cheapest: "lowest cost",
  best_rated: "highest rating",
  nearest: "shortest distance",
  value: "overall value",
};

export function formatUsd(amount: number): string {
  return `$${Math.round(amount).toLocaleString("en-US")}`;
}

function describeRow(r: SearchResult): string {
  const rating = r.averageRating === null ? "not rated" : `rated ${r.averageRating.toFixed(1)}/10`;
  const parts = [`avg covered charges ${formatUsd(r.averageCoveredCharges)}`, rating];
  if (r.distanceKm !== null) parts.push(`${r.distanceKm.toFixed(1)} km away`);
  return `${r.rank}. ${r.providerName} (${r.providerCity}, ${r.providerState}): ${parts.join(", ")}`;
}

export function buildTemplatedSummary(results: readonly SearchResult[], intent: Intent): string {
  const top = results.slice(0, TEMPLATE_ROW_LIMIT);
  return [
    `Found ${results.length} matching provider${results.length === 1 ? "" : "s"}, ranked by ${INTENT_LABELS[intent]}:`,
    ...top.map(describeRow),
  ].join("\n");
}

export function buildNoResultsMessage(hints: QuestionHints): string {
  const suggestions: string[] = [];
  if (hints.zipCode) suggestions.push("a larger search radius or a nearby ZIP code");
  if (!hints.zipCode && !hints.city) suggestions.push("adding a ZIP code or city");
  if (!hints.procedureTerms.length && !hints.drgCode) {
    suggestions.push('naming a procedure such as "knee replacement" or a 3-digit DRG code');
  } else {
    suggestions.push("a broader procedure description");
  }
  return `No providers matched your question. Try ${suggestions.join(" or ")}.`;
}

export const EXAMPLE_QUESTIONS: readonly string[] = [
  "Who is the cheapest for knee replacement near 10001?",
  "Which hospitals have the best ratings for heart surgery in New York?",
  "Find the nearest provider for DRG 470 within 25 miles of 10032",
  "What is the best value for pneumonia treatment in Brooklyn?",
  "Show top rated hospitals for hip replacement",
  "Compare costs for sepsis treatment near 11201",
];
