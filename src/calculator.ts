import { estimateBsa } from "./bsa";
import { formatCalculationLines, formatLimit } from "./format";
import { parseFrequency } from "./frequency";
import { ReportMessages, resolveReportLocalization } from "./i18n";
import { isBsaBasis, isPerDayBasis, needsBsa } from "./rule";
import {
  BasisCalculation,
  BsaEstimate,
  CalculationOptions,
  CalculationWarning,
  CeilingPolicy,
  DoseRule,
  DosingBasis,
  Patient,
  RuleCalculation
} from "./types";

interface Amounts {
  mgPerDose?: number;
  mgPerDay?: number;
}

/**
 * Applies one rule to one patient. Every dosing basis on the rule is computed
 * independently; figures keep full precision here and are only rounded when
 * formatted.
 */
export function calculateRule(
  rule: DoseRule,
  patient: Patient,
  options?: CalculationOptions
): RuleCalculation {
  const { messages } = resolveReportLocalization(options?.locale, options?.i18n);
  const dosesPerDay = parseFrequency(rule.frequency, options);
  const policy: CeilingPolicy = options?.ceilingPolicy ?? "clamp";
  const warnings: CalculationWarning[] = [];
  const results: BasisCalculation[] = [];
  const skipped: DosingBasis[] = [];

  if (!rule.bases.length) {
    warnings.push({ code: "missing-dosing-basis", message: messages.noDosingBasis });
    return { rule, dosesPerDay, results, skipped, warnings };
  }
  if (dosesPerDay === undefined) {
    warnings.push({
      code: "frequency-unknown",
      message: `${rule.frequency}: ${messages.frequencyUnknown}`
    });
  }

  const bsa = needsBsa(rule) ? estimateBsa(patient, options) : undefined;
  if (bsa?.method === "weight-only") {
    warnings.push({ code: "bsa-weight-only", message: messages.bsaLabel(bsa.method) });
  }

  for (const basis of rule.bases) {
    const usesBsa = isBsaBasis(basis.kind);
    const scale = usesBsa ? bsa?.valueM2 : patient.weightKg;
    if (scale === undefined) {
      skipped.push(basis);
      warnings.push({
        code: "bsa-unavailable",
        basis: basis.kind,
        message: messages.bsaUnavailable
      });
      continue;
    }
    const uncapped = computeAmounts(basis, scale, dosesPerDay);
    results.push(
      applyCeilings(
        rule,
        basis,
        uncapped,
        dosesPerDay,
        policy,
        usesBsa ? bsa : undefined,
        warnings,
        messages
      )
    );
  }

  return { rule, dosesPerDay, results, skipped, warnings };
}

/** Formatted result lines for one rule, without indentation. */
export function calculate(
  rule: DoseRule,
  patient: Patient,
  options?: CalculationOptions
): string[] {
  const localization = resolveReportLocalization(options?.locale, options?.i18n);
  return formatCalculationLines(calculateRule(rule, patient, options), localization);
}

function computeAmounts(
  basis: DosingBasis,
  scale: number,
  dosesPerDay: number | undefined
): Amounts {
  const amount = basis.rate * scale;
  if (isPerDayBasis(basis.kind)) {
    return {
      mgPerDay: amount,
      mgPerDose: dosesPerDay === undefined ? undefined : amount / dosesPerDay
    };
  }
  return {
    mgPerDose: amount,
    mgPerDay: dosesPerDay === undefined ? undefined : amount * dosesPerDay
  };
}

function applyCeilings(
  rule: DoseRule,
  basis: DosingBasis,
  uncapped: Amounts,
  dosesPerDay: number | undefined,
  policy: CeilingPolicy,
  bsa: BsaEstimate | undefined,
  warnings: CalculationWarning[],
  messages: ReportMessages
): BasisCalculation {
  const result: BasisCalculation = {
    basis,
    mgPerDose: uncapped.mgPerDose,
    mgPerDay: uncapped.mgPerDay,
    uncapped: { ...uncapped }
  };
  if (bsa) {
    result.bsa = bsa;
  }

  const { maxMgPerDay, maxMgPerDose } = rule;
  if (maxMgPerDay !== undefined && result.mgPerDay !== undefined && result.mgPerDay > maxMgPerDay) {
    const limit = formatLimit(maxMgPerDay);
    if (policy === "clamp") {
      result.mgPerDay = maxMgPerDay;
      if (dosesPerDay !== undefined) {
        result.mgPerDose = maxMgPerDay / dosesPerDay;
      }
      result.dayCeiling = "applied";
      warnings.push({ code: "max-day-applied", basis: basis.kind, message: messages.maxDayApplied(limit) });
    } else {
      result.dayCeiling = "exceeded";
      warnings.push({ code: "max-day-exceeded", basis: basis.kind, message: messages.maxDayExceeded(limit) });
    }
  }

  if (maxMgPerDose !== undefined && result.mgPerDose !== undefined && result.mgPerDose > maxMgPerDose) {
    const limit = formatLimit(maxMgPerDose);
    if (policy === "clamp") {
      result.mgPerDose = maxMgPerDose;
      if (dosesPerDay !== undefined && result.mgPerDay !== undefined) {
        result.mgPerDay = maxMgPerDose * dosesPerDay;
      }
      result.doseCeiling = "applied";
      warnings.push({ code: "max-dose-applied", basis: basis.kind, message: messages.maxDoseApplied(limit) });
    } else {
      result.doseCeiling = "exceeded";
      warnings.push({ code: "max-dose-exceeded", basis: basis.kind, message: messages.maxDoseExceeded(limit) });
    }
  }

  return result;
}
