import { GAMEPLAN_CONSTANTS } from "../utils/constants";
import {
  DetectedSport,
  SportKeywordTable,
} from "../types/model/sportKeyword.model";

interface CompiledSport {
  sport: string;
  pattern: RegExp;
}

const escapeRegExp = (text: string): string =>
  text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Keyword-based sport detection over free text.
 *
 * Keywords match as whole words or phrases (`\b` on both sides), so "5k"
 * matches "a 5k race" but not "25kg", and "nba" does not match "unbalanced".
 * The patterns are compiled once, when the detector is built.
 *
 * Sports are checked in the table's declared order (basketball, soccer,
 * running, tennis, volleyball for the shipped table) and the first sport with
 * a matching keyword wins, regardless of where in the text the keywords appear.
 */
export class SportDetectorService {
  private readonly compiled: readonly CompiledSport[];

  constructor(private readonly table: SportKeywordTable) {
    this.compiled = table.map(({ sport, keywords }) => ({
      sport,
      pattern: new RegExp(`\\b(?:${keywords.map(escapeRegExp).join("|")})\\b`),
    }));
  }

  detect(text: string): DetectedSport {
    const lowerText = text.toLowerCase();

    for (const { sport, pattern } of this.compiled) {
      if (pattern.test(lowerText)) {
        return sport;
      }
    }

    return GAMEPLAN_CONSTANTS.NO_SPORT;
  }

  sports(): readonly string[] {
    return this.table.map((s) => s.sport);
  }
}
