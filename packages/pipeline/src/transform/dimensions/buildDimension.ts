import type {
  DimensionRows,
  DimensionTableName,
  RawTripRecord,
} from "@repo/types";
import { logger } from "../../util/logger";
import {
  compareNaturalKeys,
  encodeNaturalKey,
  type NaturalKey,
} from "../naturalKey";

export interface DimensionDefinition<
  TTable extends DimensionTableName,
  TAttributes,
> {
  table: TTable;
  /** Columns that identify a row; also the surrogate-key sort order. */
  naturalKey(record: RawTripRecord): NaturalKey;
  /** Every stored column except the surrogate key. */
  attributes(record: RawTripRecord): TAttributes;
  toRow(key: number, attributes: TAttributes): DimensionRows[TTable];
}

export interface Dimension<TTable extends DimensionTableName> {
  table: TTable;
  /** Ordered by surrogate key, which runs densely from 1. */
  rows: DimensionRows[TTable][];
  /** Later rows whose natural key matched an earlier row but whose attributes did not. */
  conflicts: number;
  keyFor(record: RawTripRecord): number | undefined;
  describeKey(record: RawTripRecord): string;
  row(key: number): DimensionRows[TTable] | undefined;
}

interface FirstOccurrence<TAttributes> {
  naturalKey: NaturalKey;
  attributes: TAttributes;
  fingerprint: string;
}

/**
 * Deduplicates the records on the definition's natural key and assigns
 * surrogate keys 1..n in ascending natural-key order. When two records share a
 * natural key the first one's attributes are kept.
 */
export function buildDimension<TTable extends DimensionTableName, TAttributes>(
  records: readonly RawTripRecord[],
  definition: DimensionDefinition<TTable, TAttributes>,
): Dimension<TTable> {
  const firstSeen = new Map<string, FirstOccurrence<TAttributes>>();
  let conflicts = 0;

  for (const record of records) {
    const naturalKey = definition.naturalKey(record);
    const encoded = encodeNaturalKey(naturalKey);
    const attributes = definition.attributes(record);
    const fingerprint = JSON.stringify(attributes);

    const existing = firstSeen.get(encoded);
    if (!existing) {
      firstSeen.set(encoded, { naturalKey, attributes, fingerprint });
    } else if (existing.fingerprint !== fingerprint) {
      conflicts += 1;
    }
  }

  const ordered = [...firstSeen.entries()].sort(([, a], [, b]) =>
    compareNaturalKeys(a.naturalKey, b.naturalKey),
  );

  const keys = new Map<string, number>();
  const rows = ordered.map(([encoded, entry], index) => {
    const key = index + 1;
    keys.set(encoded, key);
    return definition.toRow(key, entry.attributes);
  });

  if (conflicts > 0) {
    logger.warn(
      { table: definition.table, conflicts },
      "Duplicate natural keys with differing attributes; kept first occurrence",
    );
  }

  const describeKey = (record: RawTripRecord) =>
    encodeNaturalKey(definition.naturalKey(record));

  return {
    table: definition.table,
    rows,
    conflicts,
    keyFor: (record) => keys.get(describeKey(record)),
    describeKey,
    row: (key) =>
      Number.isInteger(key) && key >= 1 && key <= rows.length
        ? rows[key - 1]
        : undefined,
  };
}
