export type ProviderResult =
  | { kind: 'text'; text: string }
  | { kind: 'records'; first: unknown; count: number }
  | { kind: 'record'; fields: Record<string, unknown> }
  | { kind: 'raw'; value: unknown };

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);

export const decodeResult = (value: unknown): ProviderResult => {
  if (typeof value === 'string') {
    return { kind: 'text', text: value };
  }
  if (Array.isArray(value) && value.length > 0) {
    return { kind: 'records', first: value[0], count: value.length };
  }
  if (isRecord(value)) {
    return { kind: 'record', fields: value };
  }
  return { kind: 'raw', value };
};

/** String form of any provider value: strings as-is, everything else as JSON. */
export const stringify = (value: unknown): string => {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'undefined';
  if (typeof value === 'bigint') return value.toString();

  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
};

const stringField = (fields: Record<string, unknown>, name: string): string | undefined => {
  const field = fields[name];
  return typeof field === 'string' ? field : undefined;
};

export const extractGeneratedText = (value: unknown): string => {
  const result = decodeResult(value);
  switch (result.kind) {
    case 'records': {
      if (isRecord(result.first)) {
        const text = stringField(result.first, 'generated_text');
        if (text !== undefined) return text;
      }
      return stringify(result.first);
    }
    case 'text':
      return result.text;
    case 'record':
      return stringify(result.fields);
    case 'raw':
      return stringify(result.value);
  }
};

export const extractTranscript = (value: unknown): string => {
  const result = decodeResult(value);
  if (result.kind === 'record') {
    const text = stringField(result.fields, 'text');
    if (text !== undefined) return text;
  }
  return stringify(value);
};
