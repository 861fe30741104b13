import { normalizeLabel } from "../loaders/catalogLoader";
import { GAMEPLAN_CONSTANTS } from "../utils/constants";
import { ExerciseCatalogData } from "../types/model/exerciseCatalog.model";

/**
 * Read-only lookup over the static exercise catalog.
 */
export class ExerciseCatalogService {
  constructor(private readonly catalog: ExerciseCatalogData) {}

  has(label: string): boolean {
    return this.catalog.has(normalizeLabel(label));
  }

  /**
   * The key actually used for `label`: its normalized form when catalogued,
   * otherwise "full body".
   */
  resolveLabel(label: string): string {
    const normalized = normalizeLabel(label);
    return this.catalog.has(normalized)
      ? normalized
      : GAMEPLAN_CONSTANTS.DEFAULT_LABEL;
  }

  /** Unknown labels silently get the "full body" entry. */
  lookup(label: string): readonly string[] {
    return this.catalog.get(this.resolveLabel(label)) ?? [];
  }

  size(label: string): number {
    return this.lookup(label).length;
  }

  labels(): readonly string[] {
    return this.catalog.keys();
  }
}
