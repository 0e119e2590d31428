import type { CityCentroid, ReferenceData } from "../config/ReferenceData";
import { tokenize } from "../search/ProcedureMatcher";

// Deterministic hints pulled from a question before any LLM call.
// They steer the planning prompt and back the fallback searches.

export const KM_PER_MILE = 1.609344;

export interface QuestionHints {
  readonly zipCode?: string;
  readonly city?: CityCentroid;
  readonly radiusKm?: number;
  readonly drgCode?: string;

  // Synonym-table keys that appear in the question, in order of appearance.
  readonly procedureTerms: readonly string[];
}

// Dollar amounts ("under $50000") are not ZIP codes.
const ZIP_RE = /(?<![$,.])\b(\d{5})(?:-\d{4})?\b(?!\s*(?:dollars?|usd)\b)/i;
const DISTANCE_RE = /(\d+(?:\.\d+)?)\s*(miles?|mi|kilometers?|kilometres?|km)\b/i;
const DRG_EXPLICIT_RE = /\b(?:ms-)?drg\s*#?\s*(\d{3})\b/i;
// A bare 3-digit number that is not a distance ("100 miles"), an amount
// ("$500") or a count ("top 100 hospitals").
const DRG_BARE_RE =
  /(?<![$,.])\b(\d{3})\b(?!\s*(?:mi|km|kilomet|hospitals?|providers?|results?|options?|dollars?|usd)|,\d)/i;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function extractZip(question: string): string | undefined {
  return ZIP_RE.exec(question)?.[1];
}

export function extractRadiusKm(question: string): number | undefined {
  const m = DISTANCE_RE.exec(question);
  if (!m) return undefined;
  const value = parseFloat(m[1]);
  if (!Number.isFinite(value) || value <= 0) return undefined;
  const km = m[2].toLowerCase().startsWith("mi") ? value * KM_PER_MILE : value;
  return Math.round(km * 100) / 100;
}

export function extractDrgCode(question: string): string | undefined {
  const explicit = DRG_EXPLICIT_RE.exec(question);
  if (explicit) return explicit[1];
  return DRG_BARE_RE.exec(question)?.[1];
}

export function findCity(question: string, cities: readonly CityCentroid[]): CityCentroid | undefined {
  const q = question.toLowerCase();
  const names = cities
    .flatMap((c) => [c.name, ...c.aliases].map((n) => ({ n: n.toLowerCase(), c })))
    .sort((a, b) => b.n.length - a.n.length);

  return names.find(({ n }) => new RegExp(`\\b${escapeRegExp(n)}\\b`).test(q))?.c;
}

// Tokens that are synonym-table keys or single-word synonym values.
export function extractProcedureTerms(question: string, synonyms: ReadonlyMap<string, readonly string[]>): string[] {
  const known = new Set<string>(synonyms.keys());
  for (const values of synonyms.values()) {
    for (const v of values) if (!/\s/.test(v)) known.add(v);
  }

  const out: string[] = [];
  for (const token of tokenize(question)) {
    if (known.has(token) && !out.includes(token)) out.push(token);
  }
  return out;
}

export function extractHints(question: string, reference: ReferenceData): QuestionHints {
  return {
    zipCode: extractZip(question),
    city: findCity(question, reference.cities),
    radiusKm: extractRadiusKm(question),
    drgCode: extractDrgCode(question),
    procedureTerms: extractProcedureTerms(question, reference.procedureSynonyms),
  };
}

// Keyword allow-list over a healthcare vocabulary, plus anything the
// synonym table or a DRG code recognizes.
export function isHealthcareQuestion(question: string, reference: ReferenceData): boolean {
  const q = question.toLowerCase();
  if (reference.healthcareVocabulary.some((w) => q.includes(w))) return true;
  if (extractProcedureTerms(question, reference.procedureSynonyms).length) return true;
  return DRG_EXPLICIT_RE.test(question);
}
