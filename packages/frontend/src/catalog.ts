/**
 * Source catalog
 *
 * Loads every requested source location once, concurrently, and hands
 * back an immutable snapshot that the resolver reads from. There is no
 * module-level cache: callers pass the catalog along explicitly.
 */

import { createSourceUnit } from "./program/creation.js";
import {
  LoadOptions,
  SourceLocation,
  SourceUnit,
  locationKey,
} from "./program/types.js";
import { Diagnostic } from "./types/diagnostic.js";
import { Result, ok, error } from "./types/result.js";

export type Catalog = {
  readonly units: ReadonlyMap<string, SourceUnit>;
};

/**
 * Load all locations. Duplicate keys share one load; the key is claimed
 * before its load starts. Every load is awaited before returning, and
 * every failure is reported.
 */
export const loadCatalog = async (
  locations: readonly SourceLocation[],
  options: LoadOptions = {}
): Promise<Result<Catalog>> => {
  const pending = new Map<string, Promise<Result<SourceUnit>>>();

  for (const location of locations) {
    const key = locationKey(location);
    if (!pending.has(key)) {
      pending.set(key, createSourceUnit(location, options));
    }
  }

  const keys = [...pending.keys()];
  const settled = await Promise.allSettled(pending.values());

  const units = new Map<string, SourceUnit>();
  const diagnostics: Diagnostic[] = [];

  settled.forEach((outcome, index) => {
    const key = keys[index];
    if (key === undefined) return;

    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
    if (outcome.value.ok) {
      units.set(key, outcome.value.value);
    } else {
      diagnostics.push(...outcome.value.error);
    }
  });

  return diagnostics.length > 0 ? error(diagnostics) : ok({ units });
};

export const lookupUnit = (
  catalog: Catalog,
  location: SourceLocation
): SourceUnit | undefined => catalog.units.get(locationKey(location));
