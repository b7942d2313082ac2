export * from "./types";
export { parseFrequency } from "./frequency";
export { estimateBsa, mostellerBsa, weightOnlyBsa } from "./bsa";
export {
  DOSING_BASIS_ORDER,
  DoseRuleInputSchema,
  createDoseRule,
  isBsaBasis,
  isPerDayBasis,
  needsBsa
} from "./rule";
export { createDrug, rulesByIndication } from "./drug";
export { PatientInputSchema, createPatient } from "./patient";
export { DrugRegistry, createRegistry, registerDrug } from "./registry";
export type { RegistryOptions } from "./registry";
export { calculate, calculateRule } from "./calculator";
export { buildReport, computeReport } from "./report";
export {
  CatalogSchema,
  DrugInputSchema,
  createDefaultRegistry,
  loadCatalog
} from "./catalog";
export type { CatalogInput, DrugInput } from "./catalog";
export { suggestDrugNames } from "./suggest";
export type { SuggestDrugOptions } from "./suggest";
export {
  formatBsa,
  formatCalculationLines,
  formatMg,
  formatRuleDescription,
  formatWeight,
  roundHalfEven
} from "./format";
export {
  DEFAULT_REPORT_LOCALE,
  getRegisteredReportLocalizations,
  registerReportLocalization,
  resolveReportLocalization
} from "./i18n";
export type {
  ReportLocalization,
  ReportLocalizationConfig,
  ReportMessages
} from "./i18n";
export {
  CatalogError,
  DoseRuleError,
  PatientInputError,
  RegistryStateError
} from "./errors";
