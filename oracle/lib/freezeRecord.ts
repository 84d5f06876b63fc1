/** Recursively freeze a plain record and return it. */
export function freezeRecord<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      freezeRecord(child);
    }
  }
  return value;
}
