import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { env } from "../../config/env.js";
import { configurationError } from "../../shared/errors.js";
import { parseRuleset, rulesetMetaSchema, type RulesetMeta } from "./schema.js";
import type { Ruleset } from "./types.js";

const BUNDLED_RULESET_ROOT = fileURLToPath(new URL("../../../rulesets/", import.meta.url));

export function resolveRulesetRoot(): string {
  return env.RULESET_DIR ? path.resolve(env.RULESET_DIR) : BUNDLED_RULESET_ROOT;
}

function readJsonFile(root: string, filePath: string): unknown {
  const absolutePath = path.resolve(root, filePath);
  try {
    return JSON.parse(readFileSync(absolutePath, "utf8"));
  } catch (error) {
    throw configurationError(`Unable to read ruleset file ${absolutePath}.`, {
      path: absolutePath,
      cause: error instanceof Error ? error.message : String(error)
    });
  }
}

export function loadRulesetMeta(root = resolveRulesetRoot()): RulesetMeta {
  const result = rulesetMetaSchema.safeParse(readJsonFile(root, "meta.json"));
  if (!result.success) {
    throw configurationError("Ruleset index meta.json is malformed.", {
      root,
      issues: result.error.issues
    });
  }

  return result.data;
}

/** Reads every ruleset listed in meta.json, checking each file against its index entry. */
export function loadRulesets(root = resolveRulesetRoot()): Ruleset[] {
  const meta = loadRulesetMeta(root);

  return meta.rulesets.map((entry) => {
    const ruleset = parseRuleset(readJsonFile(root, entry.path), entry.path);

    if (ruleset.fiscalYear !== entry.fiscalYear || ruleset.version !== entry.version) {
      throw configurationError(
        `Ruleset file ${entry.path} declares ${ruleset.version} for ${ruleset.fiscalYear}, but meta.json expects ${entry.version} for ${entry.fiscalYear}.`,
        { path: entry.path }
      );
    }

    return ruleset;
  });
}
