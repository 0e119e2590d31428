import type { ReferenceData } from "../config/ReferenceData";
import type { Intent } from "../domain/Intent";
import type { SearchResult } from "../domain/SearchResult";
import type { GeoResolver } from "../geo/GeoResolver";
import type { ProviderRepository } from "../repository/ProviderRepository";
import { detectPromptInjection } from "../validation/schemas";
import type { CompletionService } from "./CompletionService";
import { classifyIntent } from "./IntentClassifier";
import {
  OUT_OF_SCOPE_MESSAGE,
  UNSAFE_QUERY_MESSAGE,
  buildNoResultsMessage,
  buildQueryPlanningPrompt,
  buildResultNarrationPrompt,
  buildTemplatedSummary,
  strictParseJsonObject,
} from "./PromptBuilders";
import { extractHints, isHealthcareQuestion, type QuestionHints } from "./QuestionHints";
import {
  buildQueryFromHints,
  describeQuery,
  parsePlannedQuery,
  procedureTermsOf,
  replaceGeography,
  withIntentOrder,
  type QueryFilter,
  type StructuredQuery,
} from "./StructuredQuery";
import { StructuredQueryExecutor } from "./StructuredQueryExecutor";

// Natural-language questions over provider data.
//
// scope check -> classify intent -> plan query -> execute
//   -> (empty) fallback searches -> (still empty) no-results message
//   -> rank -> narrate
// Completion failures degrade to deterministic paths at each stage. A
// planned query carrying a mutation verb ends the request before any
// data access.

export type AskOutcome = "answered" | "no_results" | "rejected" | "unsafe_query" | "store_error";
export type FallbackStrategy = "wider_zip_prefix" | "city" | "procedure_category";
export type QueryOrigin = "completion" | "hints";
export type NarrationSource = "completion" | "template";

export interface AskResponse {
  readonly answer: string;
  readonly outcome: AskOutcome;
  readonly intent?: Intent;
  readonly structuredQuery?: string;
  readonly queryOrigin?: QueryOrigin;
  readonly fallbackStrategy?: FallbackStrategy;
  readonly narratedBy?: NarrationSource;
  readonly dataUsed?: readonly SearchResult[];
}

export const DATA_USED_LIMIT = 10;
const MAX_PROCEDURE_TERMS = 10;

export interface ProviderQuestionAnswererDeps {
  readonly repository: ProviderRepository;
  readonly geo: GeoResolver;
  readonly reference: ReferenceData;
  readonly completion: CompletionService;
}

type PlanResult =
  | Readonly<{ kind: "ok"; query: StructuredQuery; origin: QueryOrigin }>
  | Readonly<{ kind: "unsafe"; verb: string }>;

interface FallbackAttempt {
  readonly strategy: FallbackStrategy;
  readonly query: StructuredQuery;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ProviderQuestionAnswerer {
  private readonly executor: StructuredQueryExecutor;

  constructor(private readonly deps: ProviderQuestionAnswererDeps) {
    this.executor = new StructuredQueryExecutor(deps);
  }

  async answer(question: string): Promise<AskResponse> {
    const q = question.trim();

    if (!q || detectPromptInjection(q) || !isHealthcareQuestion(q, this.deps.reference)) {
      console.warn("[Ask] question rejected by scope check");
      return { answer: OUT_OF_SCOPE_MESSAGE, outcome: "rejected" };
    }

    const intent = classifyIntent(q);
    const hints = extractHints(q, this.deps.reference);

    const plan = await this.planQuery(q, hints, intent);
    if (plan.kind === "unsafe") {
      console.warn(`[Ask] planned query rejected: contains ${plan.verb}`);
      return { answer: UNSAFE_QUERY_MESSAGE, outcome: "unsafe_query", intent };
    }

    const first = await this.executor.execute(plan.query);
    if (!first.ok) return { answer: first.message, outcome: "store_error", intent };

    let results = first.results;
    let usedQuery = plan.query;
    let fallbackStrategy: FallbackStrategy | undefined;

    if (!results.length) {
      for (const attempt of this.fallbackAttempts(plan.query, hints)) {
        const executed = await this.executor.execute(attempt.query);
        if (!executed.ok) return { answer: executed.message, outcome: "store_error", intent };
        if (executed.results.length) {
          results = executed.results;
          usedQuery = attempt.query;
          fallbackStrategy = attempt.strategy;
          break;
        }
      }
    }

    if (!results.length) {
      console.log(`[Ask] no results (intent=${intent}, origin=${plan.origin})`);
      return {
        answer: buildNoResultsMessage(hints),
        outcome: "no_results",
        intent,
        structuredQuery: describeQuery(plan.query),
        queryOrigin: plan.origin,
      };
    }

    const narration = await this.narrate(q, intent, results);

    console.log(
      `[Ask] answered (intent=${intent}, origin=${plan.origin}, rows=${results.length}` +
        `${fallbackStrategy ? `, fallback=${fallbackStrategy}` : ""}, narratedBy=${narration.source})`,
    );

    return {
      answer: narration.answer,
      outcome: "answered",
      intent,
      structuredQuery: describeQuery(usedQuery),
      queryOrigin: plan.origin,
      fallbackStrategy,
      narratedBy: narration.source,
      dataUsed: results.slice(0, DATA_USED_LIMIT),
    };
  }

  private async planQuery(question: string, hints: QuestionHints, intent: Intent): Promise<PlanResult> {
    const { prompt, system } = buildQueryPlanningPrompt({ question, hints, intent });

    let raw: string;
    try {
      raw = await this.deps.completion.complete(prompt, system);
    } catch (err) {
      console.warn("[Ask] query planning unavailable, using hints:", describeError(err));
      return { kind: "ok", query: buildQueryFromHints(hints, intent), origin: "hints" };
    }

    const planned = parsePlannedQuery(raw);
    switch (planned.kind) {
      case "unsafe":
        return { kind: "unsafe", verb: planned.verb };
      case "invalid":
        console.warn("[Ask] planned query rejected, using hints:", planned.reason);
        return { kind: "ok", query: buildQueryFromHints(hints, intent), origin: "hints" };
      case "ok":
        return { kind: "ok", query: withIntentOrder(planned.query, intent), origin: "completion" };
    }
  }

  private categoryTerms(query: StructuredQuery, hints: QuestionHints): string[] {
    const terms = new Set<string>();
    for (const term of procedureTermsOf(hints)) {
      terms.add(term);
      for (const s of this.deps.reference.procedureSynonyms.get(term) ?? []) terms.add(s);
    }
    if (!terms.size) {
      for (const f of query.filters) {
        if (f.type === "procedure") f.terms.forEach((t) => terms.add(t));
      }
    }
    return [...terms].slice(0, MAX_PROCEDURE_TERMS);
  }

  private fallbackAttempts(query: StructuredQuery, hints: QuestionHints): FallbackAttempt[] {
    const attempts: FallbackAttempt[] = [];

    let zip = hints.zipCode;
    for (const f of query.filters) if (f.type === "radius" || f.type === "origin") zip = zip ?? f.zip;

    // A known ZIP stays the distance origin once the radius is dropped.
    const origin: QueryFilter[] = zip ? [{ type: "origin", zip }] : [];

    if (zip) {
      for (const length of [3, 2]) {
        attempts.push({
          strategy: "wider_zip_prefix",
          query: replaceGeography(query, [{ type: "zip_prefix", value: zip.slice(0, length) }, ...origin]),
        });
      }
    }

    if (hints.city) {
      attempts.push({
        strategy: "city",
        query: replaceGeography(query, [
          { type: "city", value: hints.city.city },
          { type: "state", value: hints.city.state },
          ...origin,
        ]),
      });
    }

    const terms = this.categoryTerms(query, hints);
    if (terms.length) {
      attempts.push({
        strategy: "procedure_category",
        query: { ...query, filters: [{ type: "procedure", terms }, ...origin] },
      });
    }

    return attempts;
  }

  private async narrate(
    question: string,
    intent: Intent,
    results: readonly SearchResult[],
  ): Promise<{ answer: string; source: NarrationSource }> {
    const { prompt, system } = buildResultNarrationPrompt({ question, intent, results });

    try {
      const raw = await this.deps.completion.complete(prompt, system);
      const answer = strictParseJsonObject(raw)["answer"];
      if (typeof answer !== "string" || !answer.trim()) throw new Error("LLM output must contain a non-empty answer.");
      return { answer: answer.trim(), source: "completion" };
    } catch (err) {
      console.warn("[Ask] narration unavailable, using template:", describeError(err));
      return { answer: buildTemplatedSummary(results, intent), source: "template" };
    }
  }
}
