import { existsSync, readFileSync } from "fs";
import { resolve as pathResolve } from "path";
import { z } from "zod";
import type { LatLng } from "../geo/Distance";

// Cost Navigator: Static Reference Tables
//
// Loaded once at start-up, validated, frozen, and passed by reference into the
// components that need them. Safe for unsynchronized concurrent reads.

const LatLngSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

const ZipCentroidsSchema = z.record(z.string().regex(/^\d{5}$/), LatLngSchema);

const RegionalCentroidSchema = LatLngSchema.extend({
  prefix: z.string().regex(/^\d{1,2}$/),
  label: z.string().min(1),
  jitterDegrees: z.number().min(0).max(2),
});

const RegionalTableSchema = z.object({
  default: LatLngSchema.extend({ label: z.string().min(1) }),
  regions: z.array(RegionalCentroidSchema),
});

const ProcedureSynonymsSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

const CityCentroidSchema = LatLngSchema.extend({
  name: z.string().min(1),
  aliases: z.array(z.string().min(1)),
  city: z.string().min(1),
  state: z.string().length(2),
  zipPrefix: z.string().regex(/^\d{3}$/),
});

const VocabularySchema = z.array(z.string().min(1)).min(1);

export type RegionalCentroid = z.infer<typeof RegionalCentroidSchema>;
export type CityCentroid = z.infer<typeof CityCentroidSchema>;
export type DefaultCentroid = LatLng & Readonly<{ label: string }>;

export interface ReferenceData {
  readonly zipCentroids: ReadonlyMap<string, LatLng>;
  readonly regionalCentroids: readonly RegionalCentroid[];
  readonly defaultCentroid: DefaultCentroid;
  readonly procedureSynonyms: ReadonlyMap<string, readonly string[]>;
  readonly cities: readonly CityCentroid[];
  readonly healthcareVocabulary: readonly string[];
}

export type RawReferenceData = Readonly<{
  zipCentroids: unknown;
  regionalCentroids: unknown;
  procedureSynonyms: unknown;
  cities: unknown;
  healthcareVocabulary: unknown;
}>;

export const REFERENCE_FILES = {
  zipCentroids: "zip-centroids.json",
  regionalCentroids: "regional-centroids.json",
  procedureSynonyms: "procedure-synonyms.json",
  cities: "city-centroids.json",
  healthcareVocabulary: "healthcare-vocabulary.json",
} as const;

export function buildReferenceData(raw: RawReferenceData): ReferenceData {
  const zips = ZipCentroidsSchema.parse(raw.zipCentroids);
  const regional = RegionalTableSchema.parse(raw.regionalCentroids);
  const synonyms = ProcedureSynonymsSchema.parse(raw.procedureSynonyms);
  const cities = z.array(CityCentroidSchema).parse(raw.cities);
  const vocabulary = VocabularySchema.parse(raw.healthcareVocabulary);

  const synonymMap = new Map<string, readonly string[]>();
  for (const [term, list] of Object.entries(synonyms)) {
    synonymMap.set(term.toLowerCase(), Object.freeze(list.map((s) => s.toLowerCase())));
  }

  return Object.freeze({
    zipCentroids: new Map(Object.entries(zips)),
    // Longer prefixes are more specific and must be tried first.
    regionalCentroids: Object.freeze([...regional.regions].sort((a, b) => b.prefix.length - a.prefix.length)),
    defaultCentroid: Object.freeze(regional.default),
    procedureSynonyms: synonymMap,
    cities: Object.freeze(cities),
    healthcareVocabulary: Object.freeze(vocabulary.map((w) => w.toLowerCase())),
  });
}

function readJson(dataDir: string, file: string): unknown {
  const path = pathResolve(dataDir, file);
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new Error(`Failed to read reference table ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function loadReferenceData(dataDir: string): ReferenceData {
  return buildReferenceData({
    zipCentroids: readJson(dataDir, REFERENCE_FILES.zipCentroids),
    regionalCentroids: readJson(dataDir, REFERENCE_FILES.regionalCentroids),
    procedureSynonyms: readJson(dataDir, REFERENCE_FILES.procedureSynonyms),
    cities: readJson(dataDir, REFERENCE_FILES.cities),
    healthcareVocabulary: readJson(dataDir, REFERENCE_FILES.healthcareVocabulary),
  });
}

// Resolve from deterministic locations so source and compiled runs agree.
const dataDirCandidates = [
  pathResolve(__dirname, "..", "..", "data"),
  pathResolve(__dirname, "..", "..", "..", "data"),
  pathResolve(process.cwd(), "data"),
];

export const DEFAULT_DATA_DIR =
  dataDirCandidates.find((p) => existsSync(pathResolve(p, REFERENCE_FILES.zipCentroids))) ?? dataDirCandidates[0];
