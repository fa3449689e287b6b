import { readFileSync } from "node:fs";

import { ConfigurationError } from "../../shared/errors.js";
import { isPlainObject } from "../../shared/records.js";
import { KEYWORD_FEATURES, VALID_KEYWORD_FEATURES, type KeywordFeature } from "./constants.js";

export interface KeywordRow {
  feature: KeywordFeature;
  language: string;
  phrase: string;
}

const DEFAULT_TABLE_URL = new URL("../../../data/keyword-phrases.json", import.meta.url);

function isKeywordFeature(value: unknown): value is KeywordFeature {
  return typeof value === "string" && VALID_KEYWORD_FEATURES.has(value);
}

function parseRow(value: unknown, index: number): KeywordRow {
  if (!isPlainObject(value)) {
    throw new ConfigurationError(`Keyword row ${index} must be an object`);
  }
  const row = value;
  if (!isKeywordFeature(row.feature)) {
    throw new ConfigurationError(
      `Keyword row ${index} has unknown feature "${String(row.feature)}"`
    );
  }
  if (typeof row.language !== "string" || row.language.trim() === "") {
    throw new ConfigurationError(`Keyword row ${index} is missing "language"`);
  }
  if (typeof row.phrase !== "string" || row.phrase.trim() === "") {
    throw new ConfigurationError(`Keyword row ${index} is missing "phrase"`);
  }
  return {
    feature: row.feature,
    language: row.language.trim().toLowerCase(),
    phrase: row.phrase.trim().toLowerCase()
  };
}

/**
 * (feature, language, phrase) rows. Matching is case-insensitive substring
 * containment; a message counts once per feature however many phrases hit.
 */
export class KeywordTable {
  private readonly phrasesByFeature: ReadonlyMap<KeywordFeature, readonly string[]>;
  private readonly rowList: readonly KeywordRow[];

  private constructor(rows: KeywordRow[]) {
    const grouped = new Map<KeywordFeature, string[]>();
    for (const feature of KEYWORD_FEATURES) {
      grouped.set(feature, []);
    }
    for (const row of rows) {
      const phrases = grouped.get(row.feature) ?? [];
      if (!phrases.includes(row.phrase)) {
        phrases.push(row.phrase);
      }
      grouped.set(row.feature, phrases);
    }

    for (const [feature, phrases] of grouped) {
      if (phrases.length === 0) {
        throw new ConfigurationError(`Keyword table has no phrases for "${feature}"`);
      }
    }

    this.phrasesByFeature = grouped;
    this.rowList = Object.freeze([...rows]);
  }

  static fromRows(rows: unknown): KeywordTable {
    if (!Array.isArray(rows)) {
      throw new ConfigurationError("Keyword table rows must be an array");
    }
    return new KeywordTable(rows.map((row: unknown, index: number) => parseRow(row, index)));
  }

  static fromJson(raw: string): KeywordTable {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(
        `Keyword table is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    const rows = isPlainObject(parsed) ? parsed.rows : parsed;
    return KeywordTable.fromRows(rows);
  }

  static load(path: string | URL = DEFAULT_TABLE_URL): KeywordTable {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (error) {
      throw new ConfigurationError(
        `Keyword table could not be read from ${String(path)}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
    return KeywordTable.fromJson(raw);
  }

  get rows(): readonly KeywordRow[] {
    return this.rowList;
  }

  languages(): string[] {
    return [...new Set(this.rowList.map((row) => row.language))].sort();
  }

  phrases(feature: KeywordFeature): readonly string[] {
    return this.phrasesByFeature.get(feature) ?? [];
  }

  matches(feature: KeywordFeature, text: string): boolean {
    const lowered = text.toLowerCase();
    return this.phrases(feature).some((phrase) => lowered.includes(phrase));
  }
}

let defaultTable: KeywordTable | undefined;

export function loadDefaultKeywordTable(): KeywordTable {
  if (!defaultTable) {
    defaultTable = KeywordTable.load();
  }
  return defaultTable;
}
