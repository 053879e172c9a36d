/**
 * Share of attempted entities that came back with usable data.
 * Entities that yielded nothing count against the rate; they are never
 * dropped from the denominator.
 */
export function computeSuccessRate<T>(
  entities: readonly T[],
  attempted: number,
  isUsable: (entity: T) => boolean,
): number {
  if (attempted <= 0) return 0;
  const usable = entities.filter(isUsable).length;
  return usable / attempted;
}

export function isPopulated(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (typeof value === 'number') return Number.isFinite(value) && value !== 0;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

export function hasPopulatedField<T extends object>(
  record: T,
  fields: readonly (keyof T)[],
): boolean {
  return fields.some((field) => isPopulated(record[field]));
}
