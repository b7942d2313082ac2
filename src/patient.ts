import { z } from "zod";
import { PatientInputError } from "./errors";
import { Patient, PatientInput } from "./types";

const positiveMeasurement = (label: string) =>
  z
    .number({
      required_error: `${label} is required`,
      invalid_type_error: `${label} must be a number`
    })
    .finite(`${label} must be a finite number`)
    .positive(`${label} must be greater than 0`);

export const PatientInputSchema = z.object({
  weightKg: positiveMeasurement("weightKg"),
  heightCm: positiveMeasurement("heightCm").nullish()
});

export function createPatient(input: PatientInput): Patient {
  const parsed = PatientInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new PatientInputError(
      parsed.error.issues.map((issue) => issue.message).join("; ")
    );
  }
  const { weightKg, heightCm } = parsed.data;
  return Object.freeze(
    heightCm === undefined || heightCm === null ? { weightKg } : { weightKg, heightCm }
  );
}
