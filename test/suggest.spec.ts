import { describe, expect, it } from "vitest";
import { createDrug, createRegistry, suggestDrugNames } from "../src/index";

const RULE = { indication: "genel", route: "IV", frequency: "q6h", mgPerKgPerDay: 50 };

const registry = createRegistry([
  createDrug("Ampisilin Sulbaktam", [RULE]),
  createDrug("Amoksisilin", [RULE]),
  createDrug("Seftriakson", [RULE]),
  createDrug("Gentamisin", [RULE])
]);

describe("suggestDrugNames", () => {
  it("ranks prefix matches ahead of substring matches", () => {
    expect(suggestDrugNames(registry, "am")).toEqual([
      "Amoksisilin",
      "Ampisilin Sulbaktam",
      "Gentamisin"
    ]);
  });

  it("respects the limit", () => {
    expect(suggestDrugNames(registry, "am", { limit: 1 })).toEqual(["Amoksisilin"]);
    expect(suggestDrugNames(registry, "am", { limit: 0 })).toEqual([]);
  });

  it("finds misspelled names by similarity", () => {
    expect(suggestDrugNames(registry, "sefriakson")).toEqual(["Seftriakson"]);
  });

  it("ignores case and Turkish letters", () => {
    expect(suggestDrugNames(registry, "ŞEFTRİ")).toEqual(["Seftriakson"]);
  });

  it("lists registered names for an empty query", () => {
    expect(suggestDrugNames(registry, "  ", { limit: 2 })).toEqual([
      "Ampisilin Sulbaktam",
      "Amoksisilin"
    ]);
  });
});
