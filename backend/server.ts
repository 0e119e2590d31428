import dotenv from "dotenv";
import { existsSync } from "fs";
import { resolve as pathResolve } from "path";

// Load .env before any module that reads process.env.
// Resolve from deterministic locations so startup cwd does not matter.
const envPathCandidates = [
  pathResolve(__dirname, "..", ".env"),
  pathResolve(__dirname, "..", "..", ".env"),
  pathResolve(process.cwd(), ".env"),
];

const resolvedEnvPath = envPathCandidates.find((p) => existsSync(p));
if (resolvedEnvPath) {
  dotenv.config({ path: resolvedEnvPath });
} else {
  dotenv.config();
}

import { createApp } from "./app";
import { createCompletionService } from "./ai/CompletionService";
import { ProviderQuestionAnswerer } from "./ai/ProviderQuestionAnswerer";
import { loadConfig } from "./config/AppConfig";
import { DEFAULT_DATA_DIR, loadReferenceData } from "./config/ReferenceData";
import { closeDatabasePool } from "./database/connection";
import { GeoResolver } from "./geo/GeoResolver";
import { createProviderRepository } from "./repository/RepositoryFactory";
import { ProviderSearch } from "./search/ProviderSearch";

const config = loadConfig();
const dataDir = config.dataDir ? pathResolve(config.dataDir) : DEFAULT_DATA_DIR;

const reference = loadReferenceData(dataDir);
const repository = createProviderRepository(config, dataDir);
const geo = new GeoResolver(reference, repository);
const completion = createCompletionService(config.llm);

const app = createApp({
  search: new ProviderSearch({ repository, geo, reference }),
  answerer: new ProviderQuestionAnswerer({ repository, geo, reference, completion }),
  corsOrigins: config.corsOrigins,
});

console.log("[CostNavigator] CORS allowed origins:", config.corsOrigins);

const server = app.listen(config.port, "0.0.0.0", () => {
  console.log(`[CostNavigator] Server running on port ${config.port}`);
  console.log(`[CostNavigator] API health check: http://0.0.0.0:${config.port}/api/health`);
  console.log(`[CostNavigator] Environment: ${config.env}`);
  console.log(`[CostNavigator] Database: ${config.database ? "PostgreSQL" : `In-memory (${dataDir})`}`);
  console.log(`[CostNavigator] Completion: ${completion.name}${config.llm.apiKey ? ` (${config.llm.model})` : ""}`);
});

// ---- Graceful shutdown ----
async function shutdown(signal: string): Promise<void> {
  console.log(`[CostNavigator] ${signal} received, shutting down gracefully`);
  server.close();
  try {
    await closeDatabasePool();
  } catch (err) {
    console.error("[CostNavigator] Error closing database pool:", err instanceof Error ? err.message : String(err));
  }
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
