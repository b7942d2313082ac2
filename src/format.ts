import { ReportLocalization, ReportMessages } from "./i18n";
import { BasisCalculation, DoseRule, RuleCalculation } from "./types";

const ARROW = "→";

/** Whole-mg display value. Full precision stays on the calculation. */
export function formatMg(value: number): string {
  return roundHalfEven(value).toString();
}

/** Nearest integer; exact halves go to the even neighbour (2.5 → 2, 3.5 → 4). */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction < 0.5) {
    return floor;
  }
  if (fraction > 0.5) {
    return floor + 1;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/** Weights always carry a decimal: 10 → "10.0", 12.5 → "12.5". */
export function formatWeight(weightKg: number): string {
  return Number.isInteger(weightKg) ? weightKg.toFixed(1) : weightKg.toString();
}

export function formatLimit(value: number): string {
  return value.toString();
}

export function formatBsa(valueM2: number): string {
  return valueM2.toFixed(2);
}

/** "100 mg/kg/gün / 10 mg/m²/gün, IV, q6h" */
export function formatRuleDescription(rule: DoseRule, localization: ReportLocalization): string {
  const { basisUnits } = localization.messages;
  const bases = rule.bases.map(
    (basis) => `${basis.rate} ${basisUnits[basis.kind]}`
  );
  const tail = `${rule.route}, ${rule.frequency}`;
  const description = bases.length ? `${bases.join(" / ")}, ${tail}` : tail;
  return rule.notes ? `${description} (${rule.notes})` : description;
}

export function formatCalculationLines(
  calculation: RuleCalculation,
  localization: ReportLocalization
): string[] {
  const { messages } = localization;
  if (!calculation.rule.bases.length) {
    return [`${ARROW} ${messages.noDosingBasis}`];
  }

  const lines: string[] = [];
  const bsa = calculation.results.find((result) => result.bsa)?.bsa;
  if (bsa) {
    lines.push(`${messages.bsaLabel(bsa.method)}: ${formatBsa(bsa.valueM2)} m²`);
  }
  for (const result of calculation.results) {
    lines.push(
      formatDoseLine(result, calculation.rule, messages),
      formatDayLine(result, calculation.rule, messages)
    );
  }
  if (calculation.skipped.length) {
    lines.push(`${ARROW} ${messages.bsaUnavailable}`);
  }
  return lines;
}

function formatDoseLine(
  result: BasisCalculation,
  rule: DoseRule,
  messages: ReportMessages
): string {
  if (result.mgPerDose === undefined) {
    return `${ARROW} ${messages.mgPerDose}: ${messages.frequencyUnknown}`;
  }
  const line = `${ARROW} ${formatMg(result.mgPerDose)} ${messages.mgPerDose}`;
  if (!result.doseCeiling || rule.maxMgPerDose === undefined) {
    return line;
  }
  const limit = formatLimit(rule.maxMgPerDose);
  const note =
    result.doseCeiling === "applied"
      ? messages.maxDoseApplied(limit)
      : messages.maxDoseExceeded(limit);
  return `${line} (${note})`;
}

function formatDayLine(
  result: BasisCalculation,
  rule: DoseRule,
  messages: ReportMessages
): string {
  if (result.mgPerDay === undefined) {
    return `${ARROW} ${messages.mgPerDay}: ${messages.frequencyUnknown}`;
  }
  const line = `${ARROW} ${formatMg(result.mgPerDay)} ${messages.mgPerDay}`;
  if (!result.dayCeiling || rule.maxMgPerDay === undefined) {
    return line;
  }
  const limit = formatLimit(rule.maxMgPerDay);
  const note =
    result.dayCeiling === "applied"
      ? messages.maxDayApplied(limit)
      : messages.maxDayExceeded(limit);
  return `${line} (${note})`;
}
