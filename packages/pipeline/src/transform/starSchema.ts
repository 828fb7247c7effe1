import {
  DIMENSION_TABLES,
  type DimensionTableName,
  type FactRow,
  type OrphanFact,
  type RawTripRecord,
} from "@repo/types";
import { buildDimensions, type Dimensions } from "./dimensions";
import { buildFactTable, dedupeTrips, FACT_FOREIGN_KEYS } from "./facts";

export interface StarSchema {
  dimensions: Dimensions;
  facts: FactRow[];
  orphans: OrphanFact[];
  duplicatesRemoved: number;
}

export function buildStarSchema(records: readonly RawTripRecord[]): StarSchema {
  const deduped = dedupeTrips(records);
  const dimensions = buildDimensions(deduped.records);
  const facts = buildFactTable(deduped.records, dimensions);

  return {
    dimensions,
    facts: facts.rows,
    orphans: facts.orphans,
    duplicatesRemoved: deduped.duplicatesRemoved,
  };
}

export interface DanglingForeignKey {
  tripId: number;
  table: DimensionTableName;
  key: number;
}

/** Fact foreign keys with no matching dimension row; empty after a clean build. */
export function checkReferentialIntegrity(
  model: Pick<StarSchema, "dimensions" | "facts">,
): DanglingForeignKey[] {
  const dangling: DanglingForeignKey[] = [];
  for (const fact of model.facts) {
    for (const table of DIMENSION_TABLES) {
      const key = fact[FACT_FOREIGN_KEYS[table]];
      if (model.dimensions[table].row(key) === undefined) {
        dangling.push({ tripId: fact.trip_id, table, key });
      }
    }
  }
  return dangling;
}
