import { describe, expect, it } from "vitest";
import {
  PatientInputError,
  buildReport,
  computeReport,
  createDefaultRegistry,
  createDrug,
  createRegistry
} from "../src/index";

const AMPISILIN_10_KG = [
  "İLAÇ: Ampisilin Sulbaktam",
  "Kilo: 10.0 kg",
  "",
  "GENEL:",
  "  100 mg/kg/gün, IV, q6h",
  "   → 250 mg/doz",
  "   → 1000 mg/gün",
  "  200 mg/kg/gün, IV, q6h",
  "   → 500 mg/doz",
  "   → 2000 mg/gün"
].join("\n");

const TESTDRUG = createDrug("Testdrug", [
  { indication: "general", route: "PO", frequency: "q12h", mgPerM2PerDay: 100 },
  { indication: "prophylaxis", route: "PO", frequency: "od", mgPerKgPerDose: 5 },
  { indication: "general", route: "IV", frequency: "bid", mgPerKgPerDay: 20 }
]);

describe("computeReport", () => {
  it("renders every rule of the seed drug under one indication", () => {
    const registry = createDefaultRegistry();
    expect(computeReport(registry, 10, "Ampisilin Sulbaktam")).toBe(AMPISILIN_10_KG);
  });

  it("matches the drug name case-insensitively", () => {
    const registry = createDefaultRegistry();
    expect(computeReport(registry, 10, "AMPISILIN SULBAKTAM")).toBe(AMPISILIN_10_KG);
  });

  it("returns identical text for identical input", () => {
    const registry = createDefaultRegistry();
    const first = computeReport(registry, 12.5, "ampisilin sulbaktam");
    const second = computeReport(registry, 12.5, "ampisilin sulbaktam");
    expect(second).toBe(first);
  });

  it("returns the not-found message for unknown drugs", () => {
    const registry = createDefaultRegistry();
    expect(computeReport(registry, 10, "nonexistent-drug")).toBe("İlaç bulunamadı.");
    expect(computeReport(registry, 10, "nonexistent-drug", { locale: "en" })).toBe(
      "Drug not found."
    );
  });

  it("keeps the fraction of a non-integer weight", () => {
    const registry = createDefaultRegistry();
    expect(computeReport(registry, 12.5, "ampisilin sulbaktam").split("\n")[1]).toBe(
      "Kilo: 12.5 kg"
    );
  });

  it("rejects malformed weights", () => {
    const registry = createDefaultRegistry();
    expect(() => computeReport(registry, 0, "ampisilin sulbaktam")).toThrow(PatientInputError);
    expect(() => computeReport(registry, -4, "nonexistent-drug")).toThrow(PatientInputError);
    expect(() => computeReport(registry, Number.NaN, "ampisilin sulbaktam")).toThrow(
      "weightKg must be a number"
    );
  });

  it("renders indications in first-seen order with height and BSA", () => {
    const registry = createRegistry([TESTDRUG]);
    expect(computeReport(registry, 16, "testdrug", { heightCm: 100, locale: "en" })).toBe(
      [
        "DRUG: Testdrug",
        "Weight: 16.0 kg",
        "Height: 100 cm",
        "",
        "GENERAL:",
        "  100 mg/m²/day, PO, q12h",
        "   BSA (Mosteller): 0.67 m²",
        "   → 33 mg/dose",
        "   → 67 mg/day",
        "  20 mg/kg/day, IV, bid",
        "   → mg/dose: frequency unknown",
        "   → 320 mg/day",
        "",
        "PROPHYLAXIS:",
        "  5 mg/kg/dose, PO, od",
        "   → 80 mg/dose",
        "   → 80 mg/day"
      ].join("\n")
    );
  });

  it("passes calculation options through to every rule", () => {
    const registry = createRegistry([TESTDRUG]);
    const text = computeReport(registry, 16, "testdrug", {
      heightCm: 100,
      locale: "en",
      freqMap: { bid: 2 }
    });
    expect(text.split("\n")[10]).toBe("   → 160 mg/dose");
  });
});

describe("buildReport", () => {
  it("collects warnings from every rule", () => {
    const registry = createRegistry([TESTDRUG]);
    const report = buildReport(registry, 16, "Testdrug", { heightCm: 100 });
    expect(report.found).toBe(true);
    expect(report.drug).toBe(TESTDRUG);
    expect(report.indications.map((entry) => entry.indication)).toEqual([
      "general",
      "prophylaxis"
    ]);
    expect(report.warnings.map((warning) => warning.code)).toEqual(["frequency-unknown"]);
  });

  it("suggests close names when the drug is missing", () => {
    const registry = createDefaultRegistry();
    const report = buildReport(registry, 10, "ampisilin sulbakta");
    expect(report.found).toBe(false);
    expect(report.text).toBe("İlaç bulunamadı.");
    expect(report.suggestions).toEqual(["Ampisilin Sulbaktam"]);
    expect(report.indications).toEqual([]);
  });

  it("suggests names starting with a shortened query", () => {
    const report = buildReport(createDefaultRegistry(), 10, "ampi");
    expect(report.found).toBe(false);
    expect(report.suggestions).toEqual(["Ampisilin Sulbaktam"]);
  });
});
