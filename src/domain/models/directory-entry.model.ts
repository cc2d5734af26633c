/**
 * Raw directory entries as returned by a DirectoryGateway.
 *
 * Attribute values arrive as UTF-8 encoded byte strings, multi-valued,
 * the way an LDAP search result carries them. Decoding into model values
 * happens in the model layer, never in the adapters.
 */
export type DirectoryAttributes = Record<string, Buffer[] | undefined>;

export interface DirectoryEntry {
  dn: string;
  attributes: DirectoryAttributes;
}

/** First value of an attribute decoded as UTF-8, or null when absent or empty. */
export function firstValue(entry: DirectoryEntry, attribute: string): string | null {
  const values = entry.attributes[attribute];
  if (!values || values.length === 0) return null;
  return values[0].toString('utf-8');
}

/** All values of an attribute decoded as UTF-8. */
export function allValues(entry: DirectoryEntry, attribute: string): string[] {
  return (entry.attributes[attribute] ?? []).map((v) => v.toString('utf-8'));
}

/** Encode plain strings into directory attribute form. Null/undefined attributes are omitted. */
export function encodeAttributes(
  values: Record<string, string | string[] | null | undefined>,
): DirectoryAttributes {
  const result: DirectoryAttributes = {};
  for (const [key, value] of Object.entries(values)) {
    if (value === null || value === undefined) continue;
    const list = Array.isArray(value) ? value : [value];
    result[key] = list.map((v) => Buffer.from(v, 'utf-8'));
  }
  return result;
}
