import { BsaMethod, DosingBasisKind } from "./types";

export interface ReportMessages {
  notFound: string;
  drugLabel: string;
  weightLabel: string;
  heightLabel: string;
  basisUnits: Record<DosingBasisKind, string>;
  mgPerDose: string;
  mgPerDay: string;
  frequencyUnknown: string;
  noDosingBasis: string;
  bsaUnavailable: string;
  bsaLabel(method: BsaMethod): string;
  maxDayApplied(limit: string): string;
  maxDoseApplied(limit: string): string;
  maxDayExceeded(limit: string): string;
  maxDoseExceeded(limit: string): string;
}

export interface ReportLocalization {
  readonly locale: string;
  readonly messages: ReportMessages;
}

export interface ReportLocalizationConfig {
  locale?: string;
  inherit?: string;
  messages?: Partial<ReportMessages>;
}

export const DEFAULT_REPORT_LOCALE = "tr";

const REGISTERED_LOCALIZATIONS = new Map<string, ReportLocalization>();

export function registerReportLocalization(localization: ReportLocalization): void {
  REGISTERED_LOCALIZATIONS.set(localization.locale.toLowerCase(), localization);
}

export function getRegisteredReportLocalizations(): ReportLocalization[] {
  return Array.from(REGISTERED_LOCALIZATIONS.values());
}

/**
 * Resolves the messages for a locale. A config may name a registered locale
 * to inherit from and override individual messages; unknown locales fall back
 * to the default Turkish messages.
 */
export function resolveReportLocalization(
  locale?: string,
  config?: ReportLocalizationConfig
): ReportLocalization {
  const targetKey = (config?.locale ?? locale)?.toLowerCase();
  const base = targetKey ? REGISTERED_LOCALIZATIONS.get(targetKey) : undefined;
  const inherited = config?.inherit
    ? REGISTERED_LOCALIZATIONS.get(config.inherit.toLowerCase())
    : undefined;
  const fallback = defaultLocalization();
  const source = inherited ?? base ?? fallback;

  if (!config?.messages) {
    if (!config?.locale || source.locale === config.locale) {
      return source;
    }
    return { locale: config.locale, messages: source.messages };
  }

  return {
    locale: config.locale ?? source.locale,
    messages: {
      ...source.messages,
      ...config.messages,
      basisUnits: {
        ...source.messages.basisUnits,
        ...config.messages.basisUnits
      }
    }
  };
}

function defaultLocalization(): ReportLocalization {
  const registered = REGISTERED_LOCALIZATIONS.get(DEFAULT_REPORT_LOCALE);
  if (!registered) {
    throw new Error(`Default report locale '${DEFAULT_REPORT_LOCALE}' is not registered`);
  }
  return registered;
}

registerReportLocalization({
  locale: "tr",
  messages: {
    notFound: "İlaç bulunamadı.",
    drugLabel: "İLAÇ",
    weightLabel: "Kilo",
    heightLabel: "Boy",
    basisUnits: {
      [DosingBasisKind.MgPerKgPerDay]: "mg/kg/gün",
      [DosingBasisKind.MgPerKgPerDose]: "mg/kg/doz",
      [DosingBasisKind.MgPerM2PerDay]: "mg/m²/gün",
      [DosingBasisKind.MgPerM2PerDose]: "mg/m²/doz"
    },
    mgPerDose: "mg/doz",
    mgPerDay: "mg/gün",
    frequencyUnknown: "sıklık bilinmiyor",
    noDosingBasis: "doz tabanı tanımlı değil",
    bsaUnavailable: "VYA hesaplanamadı, m² dozu atlandı",
    bsaLabel: (method) =>
      method === "mosteller" ? "VYA (Mosteller)" : "VYA (yalnız kilodan, yaklaşık)",
    maxDayApplied: (limit) => `en fazla ${limit} mg/gün uygulandı`,
    maxDoseApplied: (limit) => `en fazla ${limit} mg/doz uygulandı`,
    maxDayExceeded: (limit) => `en fazla ${limit} mg/gün aşıldı`,
    maxDoseExceeded: (limit) => `en fazla ${limit} mg/doz aşıldı`
  }
});

registerReportLocalization({
  locale: "en",
  messages: {
    notFound: "Drug not found.",
    drugLabel: "DRUG",
    weightLabel: "Weight",
    heightLabel: "Height",
    basisUnits: {
      [DosingBasisKind.MgPerKgPerDay]: "mg/kg/day",
      [DosingBasisKind.MgPerKgPerDose]: "mg/kg/dose",
      [DosingBasisKind.MgPerM2PerDay]: "mg/m²/day",
      [DosingBasisKind.MgPerM2PerDose]: "mg/m²/dose"
    },
    mgPerDose: "mg/dose",
    mgPerDay: "mg/day",
    frequencyUnknown: "frequency unknown",
    noDosingBasis: "no dosing basis defined",
    bsaUnavailable: "BSA unavailable, m² dose skipped",
    bsaLabel: (method) =>
      method === "mosteller" ? "BSA (Mosteller)" : "BSA (weight-only estimate)",
    maxDayApplied: (limit) => `max ${limit} mg/day applied`,
    maxDoseApplied: (limit) => `max ${limit} mg/dose applied`,
    maxDayExceeded: (limit) => `max ${limit} mg/day exceeded`,
    maxDoseExceeded: (limit) => `max ${limit} mg/dose exceeded`
  }
});
