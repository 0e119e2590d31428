import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import cors from "cors";
import type { ProviderQuestionAnswerer } from "./ai/ProviderQuestionAnswerer";
import { EXAMPLE_QUESTIONS } from "./ai/PromptBuilders";
import type { SearchOutcome } from "./domain/SearchOutcome";
import type { SearchResult } from "./domain/SearchResult";
import { aiRateLimiter, generalRateLimiter } from "./middleware/rateLimiter";
import type { ProviderSearch } from "./search/ProviderSearch";
import { AskRequestSchema, toValidationIssues } from "./validation/schemas";

// Cost Navigator: HTTP surface.
// Route handlers only translate between HTTP and the search/answer services.

export const API_VERSION = "1.0.0";

export interface AppDeps {
  readonly search: ProviderSearch;
  readonly answerer: ProviderQuestionAnswerer;
  readonly corsOrigins: readonly string[];
  readonly rateLimiting?: boolean;
}

// ---- Async error wrapper ----
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

// First value of a query parameter; repeated parameters keep the first.
function queryParam(req: Request, ...names: string[]): string | undefined {
  for (const name of names) {
    const v = req.query[name];
    if (typeof v === "string") return v;
    if (Array.isArray(v) && typeof v[0] === "string") return v[0];
  }
  return undefined;
}

function round(n: number, digits = 2): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

export function presentResult(r: SearchResult): Record<string, unknown> {
  return {
    ...r,
    averageRating: r.averageRating === null ? null : round(r.averageRating),
    distanceKm: r.distanceKm === null ? null : round(r.distanceKm),
    compositeScore: round(r.compositeScore),
    scoreBreakdown: {
      costScore: round(r.scoreBreakdown.costScore),
      ratingScore: round(r.scoreBreakdown.ratingScore),
      distanceScore: round(r.scoreBreakdown.distanceScore),
      volumeScore: round(r.scoreBreakdown.volumeScore),
    },
  };
}

function sendOutcome(res: Response, outcome: SearchOutcome): void {
  switch (outcome.status) {
    case "invalid":
      res.status(400).json({ error: "Invalid search parameters.", issues: outcome.issues });
      return;
    case "store_error":
      res.status(503).json({ error: outcome.message });
      return;
    case "empty":
      res.json([]);
      return;
    case "ok":
      res.json(outcome.results.map(presentResult));
      return;
  }
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const allowedOrigins = deps.corsOrigins;

  // ---- CORS ----
  app.use(cors({
    origin(requestOrigin: string | undefined, callback: (err: Error | null, allow?: boolean | string) => void) {
      // Allow server-to-server / curl / health-pings (no Origin header)
      if (!requestOrigin) return callback(null, true);
      if (allowedOrigins.includes(requestOrigin)) {
        return callback(null, requestOrigin);
      }
      console.warn(`[CORS] Blocked request from origin: ${requestOrigin}`);
      callback(new Error(`Origin ${requestOrigin} not allowed by CORS`));
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
  }));

  app.use(express.json({ limit: "100kb" }));

  // ---- Privacy headers (search questions may describe a patient's situation) ----
  app.use((_req, res, next) => {
    res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate, private");
    res.setHeader("Pragma", "no-cache");
    res.setHeader("Expires", "0");
    next();
  });

  const rateLimiting = deps.rateLimiting ?? true;
  if (rateLimiting) app.use(generalRateLimiter);
  const aiLimiter: RequestHandler = rateLimiting ? aiRateLimiter : (_req, _res, next) => next();

  // ===============================
  // GET /api/health
  // ===============================
  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      version: API_VERSION,
      timestamp: new Date().toISOString(),
      features: ["provider-search", "top-rated", "provider-lookup", "ask"],
    });
  });

  // ===============================
  // GET /api/providers?procedure=&zip=&radius_km=&limit=&intent=
  // ===============================
  app.get("/api/providers", asyncHandler(async (req, res) => {
    const outcome = await deps.search.search({
      procedure: queryParam(req, "procedure", "drg"),
      zipCode: queryParam(req, "zip", "zip_code"),
      radiusKm: queryParam(req, "radius_km"),
      limit: queryParam(req, "limit"),
      intent: queryParam(req, "intent"),
    });
    sendOutcome(res, outcome);
  }));

  // ===============================
  // GET /api/providers/top-rated?procedure=&limit=
  // ===============================
  app.get("/api/providers/top-rated", asyncHandler(async (req, res) => {
    const outcome = await deps.search.topRated({
      procedure: queryParam(req, "procedure", "drg"),
      limit: queryParam(req, "limit"),
    });
    sendOutcome(res, outcome);
  }));

  // ===============================
  // GET /api/providers/:providerId
  // ===============================
  app.get("/api/providers/:providerId", asyncHandler(async (req, res) => {
    const lookup = await deps.search.getProvider(req.params.providerId);
    switch (lookup.status) {
      case "invalid":
        res.status(400).json({ error: "Invalid provider id.", issues: lookup.issues });
        return;
      case "not_found":
        res.status(404).json({ error: "Provider not found." });
        return;
      case "store_error":
        res.status(503).json({ error: lookup.message });
        return;
      case "ok":
        res.json({ providerId: lookup.records[0].providerId, records: lookup.records });
        return;
    }
  }));

  // ===============================
  // POST /api/ask
  // ===============================
  app.post("/api/ask", aiLimiter, asyncHandler(async (req, res) => {
    const parsed = AskRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Provide a non-empty 'question' string.", issues: toValidationIssues(parsed.error) });
      return;
    }

    const response = await deps.answerer.answer(parsed.data.question);
    res.status(response.outcome === "store_error" ? 503 : 200).json({
      ...response,
      dataUsed: response.dataUsed?.map(presentResult),
    });
  }));

  // ===============================
  // GET /api/ask/examples
  // ===============================
  app.get("/api/ask/examples", (_req, res) => {
    res.json({ examples: EXAMPLE_QUESTIONS });
  });

  // ---- Global error handler ----
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser marks malformed JSON and oversized bodies with a 4xx status.
    const status = "status" in err && typeof err.status === "number" && err.status < 500 ? err.status : 500;
    if (status === 500) console.error("[CostNavigator Server Error]", err.message);
    res.status(status).json({ error: status === 500 ? "Internal server error." : err.message });
  });

  return app;
}
