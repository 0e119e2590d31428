import { z } from "zod";
import { DEFAULT_INTENT, INTENTS } from "../domain/Intent";
import type { ValidationIssue } from "../domain/SearchOutcome";

// Cost Navigator: Input Validation Schemas (Zod)
//
// Validates every incoming payload before it reaches search logic.
// These schemas mirror the domain types but enforce runtime constraints
// that TypeScript types alone cannot guarantee.

// --- Shared ---

export const ZIP_PATTERN = /^\d{5}(-\d{4})?$/;

const ZipCodeSchema = z.string().trim().regex(ZIP_PATTERN, "ZIP code must be 5 digits, optionally followed by -NNNN");

const ProcedureQuerySchema = z
  .string()
  .trim()
  .min(1, "Procedure query must not be empty")
  .max(200, "Procedure query must be 200 characters or less");

const IntentSchema = z.enum(INTENTS);

// --- API request schemas ---

export const SearchParamsSchema = z.object({
  procedure: ProcedureQuerySchema,
  zipCode: ZipCodeSchema,
  radiusKm: z.coerce.number().positive("Radius must be positive").max(500, "Radius must be 500 km or less").default(50),
  limit: z.coerce.number().int().min(1).max(100).default(50),
  intent: IntentSchema.default(DEFAULT_INTENT),
});

export type SearchParams = z.infer<typeof SearchParamsSchema>;
export type SearchParamsInput = z.input<typeof SearchParamsSchema>;

// Same keys, values not yet validated (HTTP query strings land here).
export type Unvalidated<T> = { readonly [K in keyof T]?: unknown };

export const TopRatedParamsSchema = z.object({
  procedure: ProcedureQuerySchema.optional(),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export type TopRatedParams = z.infer<typeof TopRatedParamsSchema>;
export type TopRatedParamsInput = z.input<typeof TopRatedParamsSchema>;

export const ProviderIdSchema = z.string().trim().min(1).max(64);

export const AskRequestSchema = z.object({
  question: z.string().trim().min(1, "Question must not be empty").max(1000, "Question must be 1000 characters or less"),
});

// --- Reference / seed data ---

export const ProviderRecordSchema = z.object({
  providerId: z.string().min(1),
  providerName: z.string(),
  providerCity: z.string(),
  providerState: z.string(),
  providerZipCode: z.string(),
  procedureDefinition: z.string().min(1),
  totalDischarges: z.number().int().nonnegative(),
  averageCoveredCharges: z.number().nonnegative(),
  averageTotalPayments: z.number().nonnegative(),
  averageMedicarePayments: z.number().nonnegative(),
  latitude: z.number().min(-90).max(90).nullable(),
  longitude: z.number().min(-180).max(180).nullable(),
});

export const RatingRecordSchema = z.object({
  providerId: z.string().min(1),
  rating: z.number().min(1).max(10),
  category: z.string().min(1),
});

export const ProviderDatasetSchema = z.object({
  providers: z.array(ProviderRecordSchema),
  ratings: z.array(RatingRecordSchema).default([]),
});

// --- Helpers ---

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((i) => ({ path: i.path.join(".") || "(root)", message: i.message }));
}

// --- Abuse detection ---

export function detectPromptInjection(text: string): boolean {
  // Basic patterns that suggest prompt injection attempts
  const patterns = [
    /ignore\s+(previous|above|all)\s+instructions/i,
    /you\s+are\s+now\s+/i,
    /forget\s+(everything|all|your)\s+/i,
    /system\s*:\s*/i,
    /\bact\s+as\b/i,
    /\bpretend\s+to\s+be\b/i,
    /\boverride\b.*\binstructions?\b/i,
    /\bjailbreak\b/i,
    /do\s+anything\s+now/i,
  ];

  return patterns.some((p) => p.test(text));
}
