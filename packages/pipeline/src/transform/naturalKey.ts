export type NaturalKeyValue = number | string | Date;

export type NaturalKey = readonly NaturalKeyValue[];

export function encodeNaturalKey(key: NaturalKey): string {
  return JSON.stringify(
    key.map((value) => (value instanceof Date ? value.toISOString() : value)),
  );
}

function rank(value: NaturalKeyValue): number {
  if (typeof value === "number") return 0;
  if (value instanceof Date) return 1;
  return 2;
}

function compareValues(a: NaturalKeyValue, b: NaturalKeyValue): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return rank(a) - rank(b);
}

/** Orders natural keys element by element; a shorter prefix sorts first. */
export function compareNaturalKeys(a: NaturalKey, b: NaturalKey): number {
  const length = Math.min(a.length, b.length);
  for (let index = 0; index < length; index++) {
    const order = compareValues(a[index], b[index]);
    if (order !== 0) {
      return order;
    }
  }
  return a.length - b.length;
}
