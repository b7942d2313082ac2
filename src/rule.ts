import { z } from "zod";
import { DoseRuleError } from "./errors";
import { DoseRule, DoseRuleInput, DosingBasis, DosingBasisKind } from "./types";

const optionalRate = z.number().finite().positive().nullish();

export const DoseRuleInputSchema = z.object({
  indication: z.string().trim().min(1),
  route: z.string().trim().min(1),
  frequency: z.string().trim().min(1),
  mgPerKgPerDay: optionalRate,
  mgPerKgPerDose: optionalRate,
  mgPerM2PerDay: optionalRate,
  mgPerM2PerDose: optionalRate,
  maxMgPerDay: optionalRate,
  maxMgPerDose: optionalRate,
  notes: z.string().nullish()
});

/** Canonical order in which bases are computed and rendered. */
export const DOSING_BASIS_ORDER: ReadonlyArray<DosingBasisKind> = [
  DosingBasisKind.MgPerKgPerDay,
  DosingBasisKind.MgPerKgPerDose,
  DosingBasisKind.MgPerM2PerDay,
  DosingBasisKind.MgPerM2PerDose
];

const BSA_BASES = new Set<DosingBasisKind>([
  DosingBasisKind.MgPerM2PerDay,
  DosingBasisKind.MgPerM2PerDose
]);

const PER_DAY_BASES = new Set<DosingBasisKind>([
  DosingBasisKind.MgPerKgPerDay,
  DosingBasisKind.MgPerM2PerDay
]);

export function createDoseRule(input: DoseRuleInput): DoseRule {
  const parsed = DoseRuleInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new DoseRuleError(
      `Invalid dose rule: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "rule"} ${issue.message}`)
        .join("; ")}`
    );
  }
  const data = parsed.data;
  const rates: Record<DosingBasisKind, number | null | undefined> = {
    [DosingBasisKind.MgPerKgPerDay]: data.mgPerKgPerDay,
    [DosingBasisKind.MgPerKgPerDose]: data.mgPerKgPerDose,
    [DosingBasisKind.MgPerM2PerDay]: data.mgPerM2PerDay,
    [DosingBasisKind.MgPerM2PerDose]: data.mgPerM2PerDose
  };
  const bases: DosingBasis[] = [];
  for (const kind of DOSING_BASIS_ORDER) {
    const rate = rates[kind];
    if (isSet(rate)) {
      bases.push(Object.freeze({ kind, rate }));
    }
  }

  return Object.freeze({
    indication: data.indication,
    route: data.route,
    frequency: data.frequency,
    bases: Object.freeze(bases),
    ...(isSet(data.maxMgPerDay) ? { maxMgPerDay: data.maxMgPerDay } : {}),
    ...(isSet(data.maxMgPerDose) ? { maxMgPerDose: data.maxMgPerDose } : {}),
    notes: data.notes ?? ""
  });
}

function isSet(value: number | null | undefined): value is number {
  return value !== undefined && value !== null;
}

export function needsBsa(rule: DoseRule): boolean {
  return rule.bases.some((basis) => isBsaBasis(basis.kind));
}

export function isBsaBasis(kind: DosingBasisKind): boolean {
  return BSA_BASES.has(kind);
}

export function isPerDayBasis(kind: DosingBasisKind): boolean {
  return PER_DAY_BASES.has(kind);
}
