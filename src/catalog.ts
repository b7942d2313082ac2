import { z } from "zod";
import seed from "../data/catalog.json";
import { createDrug } from "./drug";
import { CatalogError } from "./errors";
import { createRegistry, DrugRegistry, RegistryOptions } from "./registry";
import { DoseRuleInputSchema } from "./rule";
import { Drug } from "./types";

export const DrugInputSchema = z.object({
  name: z.string().trim().min(1),
  rules: z.array(DoseRuleInputSchema)
});

export const CatalogSchema = z.object({
  drugs: z.array(DrugInputSchema)
});

export type DrugInput = z.infer<typeof DrugInputSchema>;
export type CatalogInput = z.infer<typeof CatalogSchema>;

/** Validates structured catalog records and builds the drug entries. */
export function loadCatalog(data: unknown): Drug[] {
  const parsed = CatalogSchema.safeParse(data);
  if (!parsed.success) {
    throw new CatalogError(
      "Invalid drug catalog",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data.drugs.map((drug) => createDrug(drug.name, drug.rules));
}

/** Registry filled from the bundled seed catalog and sealed. */
export function createDefaultRegistry(options?: RegistryOptions): DrugRegistry {
  return createRegistry(loadCatalog(seed), options);
}
