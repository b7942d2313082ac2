import { RegistryStateError } from "./errors";
import { Drug } from "./types";
import { foldDiacritics, normalizeKey } from "./utils/text";

export interface RegistryOptions {
  /**
   * When an exact (case-insensitive) lookup misses, retry with Turkish letters
   * and other diacritics folded to plain Latin. Defaults to true.
   */
  foldDiacritics?: boolean;
}

type RegistryState = "open" | "sealed" | "disposed";

/**
 * Case-insensitive drug name → catalog entry map.
 *
 * Registries are meant to be filled once at startup and then sealed; a sealed
 * registry is read-only and can be shared between callers without locking.
 */
export class DrugRegistry {
  private readonly byName = new Map<string, Drug>();
  private readonly byFolded = new Map<string, Drug>();
  private readonly foldLookups: boolean;
  private state: RegistryState = "open";

  constructor(options?: RegistryOptions) {
    this.foldLookups = options?.foldDiacritics ?? true;
  }

  get size(): number {
    return this.byName.size;
  }

  get sealed(): boolean {
    return this.state !== "open";
  }

  /** Inserts or replaces the entry stored under the drug's normalized name. */
  register(drug: Drug): this {
    this.assertState("register");
    if (this.state === "sealed") {
      throw new RegistryStateError(
        `Cannot register '${drug.name}': registry is sealed`
      );
    }
    this.byName.set(normalizeKey(drug.name), drug);
    this.rebuildFolded();
    return this;
  }

  lookup(name: string): Drug | undefined {
    this.assertState("lookup");
    const exact = this.byName.get(normalizeKey(name));
    if (exact || !this.foldLookups) {
      return exact;
    }
    return this.byFolded.get(foldDiacritics(name));
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  names(): string[] {
    this.assertState("names");
    return Array.from(this.byName.values(), (drug) => drug.name);
  }

  drugs(): Drug[] {
    this.assertState("drugs");
    return Array.from(this.byName.values());
  }

  /** Makes the registry read-only. Sealing twice is a no-op. */
  seal(): this {
    this.assertState("seal");
    this.state = "sealed";
    return this;
  }

  /** Drops every entry; later lookups and registrations throw. */
  dispose(): void {
    this.byName.clear();
    this.byFolded.clear();
    this.state = "disposed";
  }

  private rebuildFolded() {
    this.byFolded.clear();
    // First registered name wins when two names fold to the same key.
    for (const drug of this.byName.values()) {
      const folded = foldDiacritics(drug.name);
      if (!this.byFolded.has(folded)) {
        this.byFolded.set(folded, drug);
      }
    }
  }

  private assertState(operation: string) {
    if (this.state === "disposed") {
      throw new RegistryStateError(`Cannot ${operation}: registry is disposed`);
    }
  }
}

export function createRegistry(
  drugs: Iterable<Drug>,
  options?: RegistryOptions
): DrugRegistry {
  const registry = new DrugRegistry(options);
  for (const drug of drugs) {
    registry.register(drug);
  }
  return registry.seal();
}

export function registerDrug(registry: DrugRegistry, drug: Drug): DrugRegistry {
  return registry.register(drug);
}
