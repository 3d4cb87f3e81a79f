import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { appConfig } from "../config/appConfig";
import type { Activity } from "./activity";
import { InvalidActivity } from "./errors";
import { parseActivitySet } from "./validators";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_CATALOG_PATH = path.join(__dirname, "..", "..", "data", "activities.json");

export function resolveCatalogPath(explicitPath?: string): string {
  return explicitPath || appConfig.catalogPath || DEFAULT_CATALOG_PATH;
}

/**
 * Loads the static activity catalog. Entries are validated once here; request-time code
 * treats them as immutable reference data.
 */
export function loadActivityCatalog(explicitPath?: string): Activity[] {
  const catalogPath = resolveCatalogPath(explicitPath);
  const raw = fs.readFileSync(catalogPath, "utf8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidActivity([{ field: "catalog", message: `${catalogPath} is not valid JSON: ${reason}` }]);
  }

  if (!Array.isArray(parsed)) {
    throw new InvalidActivity([{ field: "catalog", message: `${catalogPath} must contain a JSON array.` }]);
  }
  return parseActivitySet(parsed).map((activity) => Object.freeze(activity));
}

export function findActivity(catalog: readonly Activity[], id: string): Activity | null {
  return catalog.find((activity) => activity.id === id) ?? null;
}
