import rateLimit from "express-rate-limit";
import type { Request } from "express";

// Cost Navigator: Rate Limiting Middleware
//
// Two tiers:
// 1. General API: 100 req/min per client
// 2. AI endpoints: 30 req/min per client
//
// Key extraction: client IP (set `trust proxy` when deployed behind one).

function extractKey(req: Request): string {
  return req.ip || req.socket.remoteAddress || "unknown";
}

// General API rate limiter: 100 req/min
export const generalRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 100,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractKey,
  message: { error: "Too many requests. Please try again later.", retryAfterMs: 60000 },
});

// AI endpoint rate limiter: 30 req/min
export const aiRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 30,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractKey,
  message: { error: "AI request limit reached. Please wait before trying again.", retryAfterMs: 60000 },
});
