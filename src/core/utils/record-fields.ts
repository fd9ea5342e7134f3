/**
 * Copy the defined fields of a write, rendering bigint values as their exact
 * decimal string so no precision is lost crossing a JSON or SQL boundary
 */
export function serializeFields(fields: object): Record<string, unknown> {
  const serialized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }
    serialized[key] = typeof value === 'bigint' ? value.toString() : value;
  }

  return serialized;
}

/**
 * Row for an insert: serialized fields plus matching creation/update stamps
 */
export function prepareInsertRow(
  fields: object,
  now: Date,
): Record<string, unknown> {
  const timestamp = now.toISOString();
  return {
    ...serializeFields(fields),
    created_at: timestamp,
    updated_at: timestamp,
  };
}

/**
 * Row for a partial update. id and created_at never reach the store.
 */
export function prepareUpdateRow(
  fields: object,
  now: Date,
): Record<string, unknown> {
  const row = serializeFields(fields);
  delete row.id;
  delete row.created_at;
  row.updated_at = now.toISOString();
  return row;
}
