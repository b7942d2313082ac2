import type { ReportLocalizationConfig } from "./i18n";

/**
 * Unit rate a dose is computed from. Per-kg bases scale with body weight,
 * per-m² bases with the estimated body surface area.
 */
export enum DosingBasisKind {
  MgPerKgPerDay = "mgPerKgPerDay",
  MgPerKgPerDose = "mgPerKgPerDose",
  MgPerM2PerDay = "mgPerM2PerDay",
  MgPerM2PerDose = "mgPerM2PerDose"
}

export interface DosingBasis {
  readonly kind: DosingBasisKind;
  /** Positive rate in mg per kg (or per m²), per day or per dose. */
  readonly rate: number;
}

export interface DoseRule {
  readonly indication: string;
  readonly route: string;
  /** Raw frequency code as authored, e.g. "q6h", "günde 3", "od". */
  readonly frequency: string;
  readonly bases: ReadonlyArray<DosingBasis>;
  readonly maxMgPerDay?: number;
  readonly maxMgPerDose?: number;
  readonly notes: string;
}

/**
 * Flat authoring shape for a dose rule. Any combination of the four rate
 * fields may be set; each one becomes its own {@link DosingBasis}.
 */
export interface DoseRuleInput {
  indication: string;
  route: string;
  frequency: string;
  mgPerKgPerDay?: number | null;
  mgPerKgPerDose?: number | null;
  mgPerM2PerDay?: number | null;
  mgPerM2PerDose?: number | null;
  maxMgPerDay?: number | null;
  maxMgPerDose?: number | null;
  notes?: string | null;
}

export interface Drug {
  readonly name: string;
  readonly rules: ReadonlyArray<DoseRule>;
}

export interface IndicationGroup {
  indication: string;
  rules: DoseRule[];
}

export interface Patient {
  readonly weightKg: number;
  readonly heightCm?: number;
}

export interface PatientInput {
  weightKg: number;
  heightCm?: number | null;
}

export type BsaMethod = "mosteller" | "weight-only";

export interface BsaEstimate {
  valueM2: number;
  method: BsaMethod;
}

export interface FrequencyOptions {
  /**
   * Extra frequency tokens mapped to doses per day, e.g. `{ bid: 2 }`. Keys are
   * matched after lower-casing and whitespace removal. Built-in forms win over
   * entries in this map.
   */
  freqMap?: Record<string, number>;
}

export interface BsaOptions {
  /**
   * Allows the weight-only surrogate when no height is known. Defaults to true.
   */
  allowWeightOnly?: boolean;
  /**
   * Upper weight bound for the weight-only surrogate. Above it no estimate is
   * produced and m²-based rules are skipped.
   */
  weightOnlyMaxKg?: number;
}

/**
 * How `maxMgPerDay` / `maxMgPerDose` are applied.
 * - `clamp` caps the figures and flags every cap in the output (default).
 * - `flag` keeps the computed figures and only flags values over the ceiling.
 */
export type CeilingPolicy = "clamp" | "flag";

export interface CalculationOptions extends FrequencyOptions, BsaOptions {
  ceilingPolicy?: CeilingPolicy;
  locale?: string;
  i18n?: ReportLocalizationConfig;
}

export type CalculationWarningCode =
  | "frequency-unknown"
  | "missing-dosing-basis"
  | "bsa-unavailable"
  | "bsa-weight-only"
  | "max-day-applied"
  | "max-dose-applied"
  | "max-day-exceeded"
  | "max-dose-exceeded";

export interface CalculationWarning {
  code: CalculationWarningCode;
  basis?: DosingBasisKind;
  message: string;
}

export interface BasisCalculation {
  basis: DosingBasis;
  /** Full-precision mg per single dose; absent when frequency is unknown for a per-day basis. */
  mgPerDose?: number;
  /** Full-precision mg per day; absent when frequency is unknown for a per-dose basis. */
  mgPerDay?: number;
  /** The figures before any ceiling was applied. */
  uncapped: { mgPerDose?: number; mgPerDay?: number };
  dayCeiling?: "applied" | "exceeded";
  doseCeiling?: "applied" | "exceeded";
  bsa?: BsaEstimate;
}

export interface RuleCalculation {
  rule: DoseRule;
  dosesPerDay?: number;
  results: BasisCalculation[];
  /** Bases that could not be computed, e.g. an m² basis with no BSA estimate. */
  skipped: DosingBasis[];
  warnings: CalculationWarning[];
}

export interface ReportOptions extends CalculationOptions {
  heightCm?: number;
}

export interface IndicationReport {
  indication: string;
  calculations: RuleCalculation[];
}

export interface DoseReport {
  text: string;
  found: boolean;
  drug?: Drug;
  patient: Patient;
  indications: IndicationReport[];
  /** Close registry names, filled when the query missed. */
  suggestions: string[];
  warnings: CalculationWarning[];
}
