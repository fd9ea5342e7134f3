/**
 * Loosely-typed JSON object as delivered by a provider
 */
export type Payload = Record<string, unknown>;

export function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readObject(
  source: Payload | undefined,
  key: string,
): Payload | undefined {
  const value = source?.[key];
  return isPayload(value) ? value : undefined;
}

export function readString(
  source: Payload | undefined,
  key: string,
): string | undefined {
  const value = source?.[key];
  return typeof value === 'string' ? value : undefined;
}

export function readArray(source: Payload | undefined, key: string): unknown[] {
  const value = source?.[key];
  return Array.isArray(value) ? value : [];
}

/**
 * Read a reference that is either an id string or an expanded object with an id
 */
export function readReference(
  source: Payload | undefined,
  key: string,
): string | undefined {
  const value = source?.[key];
  if (typeof value === 'string') {
    return value;
  }
  return isPayload(value) ? readString(value, 'id') : undefined;
}
