import fs from "fs";
import path from "path";
import { z } from "zod";
import { logger } from "../utils/logger";
import { GAMEPLAN_CONSTANTS } from "../utils/constants";
import { ConfigError, errorMessage } from "../utils/errors";
import { ExerciseCatalogData } from "../types/model/exerciseCatalog.model";
import { SportKeywordTable } from "../types/model/sportKeyword.model";

const DATA_DIR = path.resolve(__dirname, "../data");

const catalogSchema = z
  .array(
    z.object({
      label: z.string().trim().min(1, "label is required"),
      exercises: z
        .array(z.string().trim().min(1))
        .min(1, "every catalog entry needs at least one exercise"),
    })
  )
  .min(1, "exercise catalog is empty");

const sportKeywordSchema = z.array(
  z.object({
    sport: z.string().trim().min(1, "sport is required"),
    keywords: z.array(z.string().trim().min(1)).min(1),
  })
);

export const normalizeLabel = (label: string): string =>
  label.trim().toLowerCase();

const readJson = (fileName: string, dataDir: string): unknown => {
  const filePath = path.join(dataDir, fileName);
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read ${filePath}: ${errorMessage(error)}`);
  }
};

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");

/**
 * Builds the catalog as a frozen view over a private map, so nothing that
 * holds it can add, replace or remove entries. Key order follows the input.
 */
export function buildCatalog(raw: unknown): ExerciseCatalogData {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid exercise catalog: ${formatIssues(parsed.error)}`);
  }

  const catalog = new Map<string, readonly string[]>();
  for (const entry of parsed.data) {
    const label = normalizeLabel(entry.label);
    if (catalog.has(label)) {
      throw new ConfigError(`Duplicate exercise catalog label: "${label}"`);
    }
    catalog.set(label, Object.freeze([...entry.exercises]));
  }

  if (!catalog.has(GAMEPLAN_CONSTANTS.DEFAULT_LABEL)) {
    throw new ConfigError(
      `Exercise catalog must contain the "${GAMEPLAN_CONSTANTS.DEFAULT_LABEL}" entry`
    );
  }

  return Object.freeze({
    size: catalog.size,
    get: (label: string) => catalog.get(label),
    has: (label: string) => catalog.has(label),
    keys: () => [...catalog.keys()],
  });
}

export function buildSportKeywordTable(raw: unknown): SportKeywordTable {
  const parsed = sportKeywordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid sport keyword table: ${formatIssues(parsed.error)}`);
  }

  const seen = new Set<string>();
  const table = parsed.data.map(({ sport, keywords }) => {
    const label = normalizeLabel(sport);
    if (seen.has(label)) {
      throw new ConfigError(`Duplicate sport in keyword table: "${label}"`);
    }
    seen.add(label);
    return Object.freeze({
      sport: label,
      keywords: Object.freeze(keywords.map((k) => k.toLowerCase())),
    });
  });

  return Object.freeze(table);
}

/**
 * Sports the detector can return but the catalog cannot sample from.
 */
export function findUncataloguedSports(
  table: SportKeywordTable,
  catalog: ExerciseCatalogData
): string[] {
  return table.map((s) => s.sport).filter((sport) => !catalog.has(sport));
}

export interface StaticData {
  catalog: ExerciseCatalogData;
  sportKeywords: SportKeywordTable;
}

export function loadStaticData(dataDir: string = DATA_DIR): StaticData {
  const catalog = buildCatalog(readJson("exercise-catalog.json", dataDir));
  const sportKeywords = buildSportKeywordTable(
    readJson("sport-keywords.json", dataDir)
  );

  const missing = findUncataloguedSports(sportKeywords, catalog);
  if (missing.length > 0) {
    logger.warn(
      `Sports without catalog entries will sample from the selected focus area: ${missing.join(", ")}`
    );
  }

  logger.info(
    `Loaded ${catalog.size} catalog entries and ${sportKeywords.length} sport keyword sets`
  );
  return { catalog, sportKeywords };
}
