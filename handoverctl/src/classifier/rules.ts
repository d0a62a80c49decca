import type { GroupsConfig } from "../types/config.js";

/** One row of the classification table: first matching pattern wins. */
export type GroupRule = {
  name: keyof GroupsConfig;
  pattern: RegExp;
  group: string;
};

/**
 * Database naming patterns in declaration order. The patterns overlap
 * (`x_funcgen_1_y_compara_2` matches two), so order is the tie-break.
 */
export const GROUP_PATTERNS: ReadonlyArray<{ name: keyof GroupsConfig; pattern: RegExp }> = [
  { name: "core", pattern: /^.*[a-z]_(core|rnaseq|cdna|otherfeatures)_[0-9]/ },
  { name: "variation", pattern: /^.*[a-z]_variation_[0-9]/ },
  { name: "funcgen", pattern: /^.*[a-z]_funcgen_[0-9]/ },
  { name: "compara", pattern: /^.*[a-z]_compara_[0-9]/ },
];

/** Bind the configured validation group names to the naming patterns. */
export function buildGroupRules(groups: GroupsConfig): GroupRule[] {
  return GROUP_PATTERNS.map(({ name, pattern }) => ({ name, pattern, group: groups[name] }));
}

/** Return the first rule whose pattern matches, or null. */
export function matchGroupRule(identifier: string, rules: readonly GroupRule[]): GroupRule | null {
  for (const rule of rules) {
    if (rule.pattern.test(identifier)) {
      return rule;
    }
  }
  return null;
}
