export type PlainRecord = Record<string, unknown>;

export function isPlainRecord(value: unknown): value is PlainRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(target: PlainRecord, source: PlainRecord | null | undefined): PlainRecord {
  const output: PlainRecord = { ...target };
  if (!source) return output;
  for (const [key, value] of Object.entries(source)) {
    if (Array.isArray(value)) {
      output[key] = [...value];
    } else if (isPlainRecord(value)) {
      const current = output[key];
      output[key] = deepMerge(isPlainRecord(current) ? current : {}, value);
    } else if (value !== undefined) {
      output[key] = value;
    }
  }
  return output;
}
