import { describe, expect, it } from "vitest";
import {
  DEFAULT_REPORT_LOCALE,
  computeReport,
  createDefaultRegistry,
  getRegisteredReportLocalizations,
  registerReportLocalization,
  resolveReportLocalization
} from "../src/index";

describe("report localization", () => {
  it("ships Turkish and English messages", () => {
    const locales = getRegisteredReportLocalizations().map((entry) => entry.locale);
    expect(locales).toContain("tr");
    expect(locales).toContain("en");
    expect(DEFAULT_REPORT_LOCALE).toBe("tr");
  });

  it("resolves locales case-insensitively", () => {
    expect(resolveReportLocalization("EN").messages.notFound).toBe("Drug not found.");
  });

  it("falls back to Turkish for unknown locales", () => {
    const localization = resolveReportLocalization("fr");
    expect(localization.locale).toBe("tr");
    expect(localization.messages.notFound).toBe("İlaç bulunamadı.");
  });

  it("overrides individual messages on top of an inherited locale", () => {
    const localization = resolveReportLocalization(undefined, {
      inherit: "en",
      messages: { notFound: "No such drug." }
    });
    expect(localization.locale).toBe("en");
    expect(localization.messages.notFound).toBe("No such drug.");
    expect(localization.messages.mgPerDay).toBe("mg/day");
  });

  it("uses registered localizations in reports", () => {
    const english = resolveReportLocalization("en");
    registerReportLocalization({
      locale: "en-x-short",
      messages: {
        ...english.messages,
        drugLabel: "Rx",
        weightLabel: "Wt"
      }
    });
    const text = computeReport(createDefaultRegistry(), 10, "ampisilin sulbaktam", {
      locale: "en-x-short"
    });
    expect(text.split("\n").slice(0, 2)).toEqual(["Rx: Ampisilin Sulbaktam", "Wt: 10.0 kg"]);
  });
});
