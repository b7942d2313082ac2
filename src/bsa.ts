import { BsaEstimate, BsaOptions, Patient } from "./types";

/** Mosteller formula, in m². */
export function mostellerBsa(weightKg: number, heightCm: number): number {
  return Math.sqrt((heightCm * weightKg) / 3600);
}

/**
 * Weight-only BSA surrogate, `(4W + 7) / (W + 90)` in m². An approximation
 * meant for pediatric weights; prefer {@link mostellerBsa} whenever height is
 * known.
 */
export function weightOnlyBsa(weightKg: number): number {
  return (weightKg * 4 + 7) / (weightKg + 90);
}

/**
 * Picks exactly one formula: Mosteller when the patient has a height,
 * otherwise the weight-only surrogate if the options allow it.
 */
export function estimateBsa(
  patient: Patient,
  options?: BsaOptions
): BsaEstimate | undefined {
  if (patient.heightCm !== undefined) {
    return {
      valueM2: mostellerBsa(patient.weightKg, patient.heightCm),
      method: "mosteller"
    };
  }
  if (options?.allowWeightOnly === false) {
    return undefined;
  }
  if (
    options?.weightOnlyMaxKg !== undefined &&
    patient.weightKg > options.weightOnlyMaxKg
  ) {
    return undefined;
  }
  return { valueM2: weightOnlyBsa(patient.weightKg), method: "weight-only" };
}
