import type { ParsedToken } from '../types.js';

/** A role and the affix/MIDDLE families that signal it. Unset families match anything. */
export interface RoleRule {
  role: string;
  prefixes?: string[];
  middles?: string[];
  suffixes?: string[];
}

export function ruleMatches(token: ParsedToken, rule: RoleRule): boolean {
  if (!rule.prefixes && !rule.middles && !rule.suffixes) return false;
  if (rule.prefixes && !rule.prefixes.includes(token.prefix ?? '')) return false;
  if (rule.middles && !rule.middles.includes(token.middle)) return false;
  if (rule.suffixes && !rule.suffixes.includes(token.suffix ?? '')) return false;
  return true;
}

/** Share of occurrences matching the rule; 0 for no occurrences. */
export function ruleAgreement(occurrences: readonly ParsedToken[], rule: RoleRule): number {
  if (occurrences.length === 0) return 0;
  return occurrences.filter(t => ruleMatches(t, rule)).length / occurrences.length;
}

/** First rule reaching `threshold` agreement, in declaration order. */
export function firstAgreeingRule(
  occurrences: readonly ParsedToken[],
  rules: readonly RoleRule[],
  threshold: number,
): RoleRule | null {
  if (occurrences.length === 0) return null;
  return rules.find(r => ruleAgreement(occurrences, r) >= threshold) ?? null;
}
