/** Own entry of a keyed record; keys inherited from Object.prototype never match. */
export const ownValue = <T>(record: Record<string, T>, key: string): T | undefined => (
  Object.hasOwn(record, key) ? record[key] : undefined
);
