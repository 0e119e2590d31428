import { readFileSync } from "fs";
import { resolve as pathResolve } from "path";
import type { AppConfig } from "../config/AppConfig";
import { configureDatabase } from "../database/connection";
import { ProviderDatasetSchema } from "../validation/schemas";
import { InMemoryProviderRepository } from "./InMemoryProviderRepository";
import { PostgresProviderRepository } from "./PostgresProviderRepository";
import type { ProviderRepository } from "./ProviderRepository";

// Repository Factory (Cost Navigator)
// - The ONLY place where the storage implementation is selected.
// - Selects PostgreSQL when DATABASE_URL is set, otherwise falls back to
//   in-memory, seeded from data/sample-providers.json.

export const SAMPLE_DATASET_FILE = "sample-providers.json";

export function loadInMemoryRepository(dataDir: string): InMemoryProviderRepository {
  const path = pathResolve(dataDir, SAMPLE_DATASET_FILE);
  const dataset = ProviderDatasetSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
  return new InMemoryProviderRepository(dataset.providers, dataset.ratings);
}

export function createProviderRepository(config: AppConfig, dataDir: string): ProviderRepository {
  if (config.database) {
    console.log("[CostNavigator] Using PostgreSQL repository");
    configureDatabase(config.database);
    return new PostgresProviderRepository();
  }

  console.log("[CostNavigator] Using in-memory repository (no DATABASE_URL set)");
  return loadInMemoryRepository(dataDir);
}
