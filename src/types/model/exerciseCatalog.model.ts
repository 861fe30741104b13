/**
 * Read-only view over the catalog. There is no `set` or `delete`.
 */
export interface ExerciseCatalogData {
  readonly size: number;
  get(label: string): readonly string[] | undefined;
  has(label: string): boolean;
  keys(): string[];
}
