import type { Intent } from "../domain/Intent";

// Keyword-based intent detection. First matching group wins; there is no
// scoring or confidence beyond that. Group order is part of the contract.

type KeywordGroup = Readonly<{ intent: Intent; keywords: readonly string[] }>;

export const INTENT_KEYWORD_GROUPS: readonly KeywordGroup[] = [
  { intent: "cheapest", keywords: ["cheapest", "lowest cost", "most affordable", "least expensive", "budget"] },
  { intent: "best_rated", keywords: ["best rated", "highest rated", "top rated", "best quality", "highest quality"] },
  { intent: "nearest", keywords: ["nearest", "closest", "nearby", "close to", "near me"] },
  { intent: "value", keywords: ["best value", "good value", "value for money", "cost vs rating", "bang for"] },

  // Secondary checks: weaker single terms.
  { intent: "cheapest", keywords: ["cheap", "affordable", "inexpensive", "lowest price", "cost", "price"] },
  { intent: "best_rated", keywords: ["rating", "rated", "quality", "reviews", "best"] },
  { intent: "nearest", keywords: ["near", "close", "distance", "closer"] },
];

export function classifyIntent(question: string): Intent {
  const q = question.toLowerCase();
  for (const group of INTENT_KEYWORD_GROUPS) {
    if (group.keywords.some((k) => q.includes(k))) return group.intent;
  }
  return "value";
}
