export class DoseRuleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DoseRuleError";
  }
}

export class PatientInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PatientInputError";
  }
}

export class CatalogError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "CatalogError";
    this.issues = issues;
  }
}

export class RegistryStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryStateError";
  }
}
