import type { ModuleReference } from "./reference.js";
import type { ModuleInfo } from "./types.js";

type CacheEntry<TModule, TTypeInfo> =
  | {
      status: "pending";
      reference: ModuleReference;
      promise: Promise<ModuleInfo<TModule, TTypeInfo>>;
    }
  | {
      status: "ready";
      reference: ModuleReference;
      info: ModuleInfo<TModule, TTypeInfo>;
    };

/**
 * Memoizes imported modules for one compilation session. A module is stored
 * at most once and is handed out by identity; loads still in flight are kept
 * as pending entries so later importers can wait on them.
 */
export class ImportCache<TModule, TTypeInfo> {
  #entries = new Map<string, CacheEntry<TModule, TTypeInfo>>();
  /** importer key -> keys of pending modules it is waiting on */
  #waits = new Map<string, Map<string, number>>();
  #waitReferences = new Map<string, ModuleReference>();

  contains(reference: ModuleReference): boolean {
    return this.#entries.get(reference.key)?.status === "ready";
  }

  get(reference: ModuleReference): ModuleInfo<TModule, TTypeInfo> {
    const entry = this.#entries.get(reference.key);
    if (entry?.status !== "ready") {
      throw new Error(`module ${reference.key} is not in the import cache`);
    }
    return entry.info;
  }

  put(
    reference: ModuleReference,
    info: ModuleInfo<TModule, TTypeInfo>
  ): ModuleInfo<TModule, TTypeInfo> {
    if (this.contains(reference)) {
      throw new Error(`module ${reference.key} is already in the import cache`);
    }
    const frozen = Object.isFrozen(info) ? info : Object.freeze({ ...info });
    this.#entries.set(reference.key, {
      status: "ready",
      reference,
      info: frozen,
    });
    return frozen;
  }

  pending(
    reference: ModuleReference
  ): Promise<ModuleInfo<TModule, TTypeInfo>> | undefined {
    const entry = this.#entries.get(reference.key);
    return entry?.status === "pending" ? entry.promise : undefined;
  }

  markPending(
    reference: ModuleReference,
    promise: Promise<ModuleInfo<TModule, TTypeInfo>>
  ): void {
    if (this.#entries.has(reference.key)) {
      throw new Error(`module ${reference.key} is already being imported`);
    }
    this.#entries.set(reference.key, { status: "pending", reference, promise });
  }

  /** Drops a failed load so the next request starts over. */
  discardPending(reference: ModuleReference): void {
    if (this.#entries.get(reference.key)?.status === "pending") {
      this.#entries.delete(reference.key);
    }
  }

  /**
   * Records that the load of `importer` waits on the pending load of
   * `dependency`. Returns the cycle (`dependency -> ... -> importer ->
   * dependency`) instead when waiting would never finish.
   */
  beginWait(
    importer: ModuleReference,
    dependency: ModuleReference
  ): readonly ModuleReference[] | undefined {
    this.#waitReferences.set(importer.key, importer);
    this.#waitReferences.set(dependency.key, dependency);
    const cycle = this.#findWaitPath(dependency.key, importer.key);
    if (cycle) {
      return [...cycle, dependency.key].map((key) => this.#referenceFor(key));
    }
    const waits = this.#waits.get(importer.key) ?? new Map<string, number>();
    waits.set(dependency.key, (waits.get(dependency.key) ?? 0) + 1);
    this.#waits.set(importer.key, waits);
    return undefined;
  }

  endWait(importer: ModuleReference, dependency: ModuleReference): void {
    const waits = this.#waits.get(importer.key);
    const count = waits?.get(dependency.key);
    if (!waits || count === undefined) return;
    if (count > 1) {
      waits.set(dependency.key, count - 1);
      return;
    }
    waits.delete(dependency.key);
    if (waits.size === 0) {
      this.#waits.delete(importer.key);
    }
  }

  get size(): number {
    let ready = 0;
    this.#entries.forEach((entry) => {
      if (entry.status === "ready") ready += 1;
    });
    return ready;
  }

  references(): ModuleReference[] {
    return Array.from(this.#entries.values())
      .filter((entry) => entry.status === "ready")
      .map((entry) => entry.reference);
  }

  #findWaitPath(from: string, to: string): string[] | undefined {
    const visited = new Set<string>();
    const visit = (key: string, path: string[]): string[] | undefined => {
      if (key === to) return [...path, key];
      if (visited.has(key)) return undefined;
      visited.add(key);
      for (const next of this.#waits.get(key)?.keys() ?? []) {
        const found = visit(next, [...path, key]);
        if (found) return found;
      }
      return undefined;
    };
    return visit(from, []);
  }

  #referenceFor(key: string): ModuleReference {
    const reference = this.#waitReferences.get(key);
    if (!reference) {
      throw new Error(`module ${key} is not waiting on any import`);
    }
    return reference;
  }
}
