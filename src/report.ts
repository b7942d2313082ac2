import { calculateRule } from "./calculator";
import { rulesByIndication } from "./drug";
import { formatCalculationLines, formatRuleDescription, formatWeight } from "./format";
import { resolveReportLocalization } from "./i18n";
import { createPatient } from "./patient";
import { DrugRegistry } from "./registry";
import { suggestDrugNames } from "./suggest";
import { DoseReport, IndicationReport, ReportOptions } from "./types";

const DESCRIPTION_INDENT = "  ";
const RESULT_INDENT = "   ";
const NOT_FOUND_SUGGESTION_LIMIT = 3;

/**
 * Looks up a drug and computes every rule for a patient of the given weight.
 * A missing drug is a normal outcome with `found: false`; only malformed
 * weight or height input throws.
 */
export function buildReport(
  registry: DrugRegistry,
  weightKg: number,
  drugQuery: string,
  options?: ReportOptions
): DoseReport {
  const patient = createPatient({ weightKg, heightCm: options?.heightCm });
  const localization = resolveReportLocalization(options?.locale, options?.i18n);
  const { messages } = localization;

  const drug = registry.lookup(drugQuery);
  if (!drug) {
    return {
      text: messages.notFound,
      found: false,
      patient,
      indications: [],
      suggestions: suggestDrugNames(registry, drugQuery, {
        limit: NOT_FOUND_SUGGESTION_LIMIT
      }),
      warnings: []
    };
  }

  const lines = [
    `${messages.drugLabel}: ${drug.name}`,
    `${messages.weightLabel}: ${formatWeight(patient.weightKg)} kg`
  ];
  if (patient.heightCm !== undefined) {
    lines.push(`${messages.heightLabel}: ${patient.heightCm} cm`);
  }

  const indications: IndicationReport[] = [];
  for (const group of rulesByIndication(drug)) {
    lines.push("", `${group.indication.toUpperCase()}:`);
    const calculations = group.rules.map((rule) => {
      const calculation = calculateRule(rule, patient, options);
      lines.push(DESCRIPTION_INDENT + formatRuleDescription(rule, localization));
      for (const line of formatCalculationLines(calculation, localization)) {
        lines.push(RESULT_INDENT + line);
      }
      return calculation;
    });
    indications.push({ indication: group.indication, calculations });
  }

  return {
    text: lines.join("\n"),
    found: true,
    drug,
    patient,
    indications,
    suggestions: [],
    warnings: indications.flatMap((entry) =>
      entry.calculations.flatMap((calculation) => calculation.warnings)
    )
  };
}

export function computeReport(
  registry: DrugRegistry,
  weightKg: number,
  drugQuery: string,
  options?: ReportOptions
): string {
  return buildReport(registry, weightKg, drugQuery, options).text;
}
