import { createDoseRule } from "./rule";
import { DoseRule, DoseRuleInput, Drug, IndicationGroup } from "./types";
import { normalizeSpacing } from "./utils/text";

/**
 * Builds a catalog entry. Rules keep the order they are given in; inputs in
 * the flat authoring shape are turned into rules first.
 */
export function createDrug(
  name: string,
  rules: ReadonlyArray<DoseRule | DoseRuleInput>
): Drug {
  const displayName = normalizeSpacing(name);
  if (!displayName) {
    throw new Error("Drug name must not be empty");
  }
  return Object.freeze({
    name: displayName,
    rules: Object.freeze(rules.map((rule) => (isDoseRule(rule) ? rule : createDoseRule(rule))))
  });
}

function isDoseRule(value: DoseRule | DoseRuleInput): value is DoseRule {
  return "bases" in value;
}

/** Groups rules by indication, keeping first-seen indication order. */
export function rulesByIndication(drug: Drug): IndicationGroup[] {
  const groups = new Map<string, DoseRule[]>();
  for (const rule of drug.rules) {
    const existing = groups.get(rule.indication);
    if (existing) {
      existing.push(rule);
    } else {
      groups.set(rule.indication, [rule]);
    }
  }
  return Array.from(groups, ([indication, rules]) => ({ indication, rules }));
}
