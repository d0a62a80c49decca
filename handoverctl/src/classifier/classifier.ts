import { matchGroupRule, type GroupRule } from "./rules.js";

export type ClassificationResult = {
  group: string | null;
  reason: string;
};

/**
 * Pick the validation group for a database identifier (usually the source URI).
 * Returns `group: null` when no rule matches and validation is skipped.
 */
export function classifyDatabase(identifier: string, rules: readonly GroupRule[]): ClassificationResult {
  const rule = matchGroupRule(identifier, rules);
  if (!rule) {
    return { group: null, reason: "No naming rule matched, skipping validation" };
  }
  return { group: rule.group, reason: `Matched ${rule.name} naming rule` };
}
