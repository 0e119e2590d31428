// Ranking preference inferred per request. Never persisted.
export const INTENTS = ["cheapest", "best_rated", "nearest", "value"] as const;

export type Intent = (typeof INTENTS)[number];

export const DEFAULT_INTENT: Intent = "value";
