import assert from "node:assert/strict";
import test from "node:test";

import { FeatureNames } from "../../src/modules/feature-extraction/constants.js";
import {
  KeywordTable,
  loadDefaultKeywordTable
} from "../../src/modules/feature-extraction/keyword-table.js";
import { ConfigurationError } from "../../src/shared/errors.js";

const MINIMAL_ROWS = [
  { feature: "emotional_dependency_indicators", language: "en", phrase: "miss you" },
  { feature: "isolation_pressure", language: "en", phrase: "just us" },
  { feature: "secrecy_pressure", language: "en", phrase: "our secret" },
  { feature: "platform_migration_attempts", language: "en", phrase: "whatsapp" }
];

test("default table covers every keyword feature in three languages", () => {
  const table = loadDefaultKeywordTable();

  assert.deepEqual(table.languages(), ["en", "es", "pt"]);
  assert.equal(table.rows.length, 175);
  assert.ok(table.phrases(FeatureNames.ISOLATION).includes("your parents"));
  assert.equal(loadDefaultKeywordTable(), table);
});

test("matching is case-insensitive substring containment", () => {
  const table = KeywordTable.fromRows(MINIMAL_ROWS);

  assert.equal(table.matches(FeatureNames.PLATFORM_MIGRATION, "Add me on WhatsApp later"), true);
  assert.equal(table.matches(FeatureNames.SECRECY, "This is OUR SECRET"), true);
  assert.equal(table.matches(FeatureNames.SECRECY, "see you at practice"), false);
});

test("rows are trimmed, lowercased and deduplicated per feature", () => {
  const table = KeywordTable.fromRows([
    ...MINIMAL_ROWS,
    { feature: "isolation_pressure", language: " EN ", phrase: " Just Us " }
  ]);

  assert.deepEqual(table.phrases(FeatureNames.ISOLATION), ["just us"]);
  assert.equal(table.rows.length, 5);
  assert.deepEqual(table.languages(), ["en"]);
});

test("rejects a table that leaves a feature without phrases", () => {
  assert.throws(
    () => {
      KeywordTable.fromRows(MINIMAL_ROWS.slice(0, 2));
    },
    (error: unknown) =>
      error instanceof ConfigurationError &&
      error.message === 'Keyword table has no phrases for "secrecy_pressure"'
  );
});

test("rejects rows with an unknown feature or missing phrase", () => {
  assert.throws(() => {
    KeywordTable.fromRows([...MINIMAL_ROWS, { feature: "grooming", language: "en", phrase: "x" }]);
  }, /Keyword row 4 has unknown feature "grooming"/);

  assert.throws(() => {
    KeywordTable.fromRows([
      ...MINIMAL_ROWS,
      { feature: "secrecy_pressure", language: "en", phrase: "  " }
    ]);
  }, /Keyword row 4 is missing "phrase"/);
});

test("parses json with a rows wrapper or a bare array", () => {
  const wrapped = KeywordTable.fromJson(JSON.stringify({ rows: MINIMAL_ROWS }));
  const bare = KeywordTable.fromJson(JSON.stringify(MINIMAL_ROWS));

  assert.equal(wrapped.rows.length, 4);
  assert.equal(bare.rows.length, 4);
  assert.throws(() => {
    KeywordTable.fromJson("{rows:");
  }, /Keyword table is not valid JSON/);
});

test("reports an unreadable table path as a configuration error", () => {
  assert.throws(() => {
    KeywordTable.load("/nonexistent/keyword-phrases.json");
  }, /Keyword table could not be read from \/nonexistent\/keyword-phrases\.json/);
});
