export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** JSON round-trip: entity data and fire context must be JSON-serializable. */
export function cloneData(
  value: Record<string, unknown>,
): Record<string, unknown> {
  const copy: unknown = JSON.parse(JSON.stringify(value));
  return isPlainObject(copy) ? copy : {};
}
