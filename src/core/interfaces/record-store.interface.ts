/**
 * Minimum shape of anything kept in a record store
 */
export interface StoreRecord {
  id: string;
  created_at?: string;
  updated_at?: string;
}

/**
 * Fields a caller may write; identity and timestamps are owned by the store
 */
export type RecordPatch<T extends StoreRecord> = Partial<
  Omit<T, 'id' | 'created_at' | 'updated_at'>
>;

/**
 * Fields for a new record. The id is supplied by the caller, never generated.
 */
export type NewRecord<T extends StoreRecord> = Pick<T, 'id'> & RecordPatch<T>;

/**
 * Turns a raw row into a typed record, throwing when the row is unusable
 */
export type RowDecoder<T extends StoreRecord> = (
  row: Record<string, unknown>,
) => T;

/**
 * Record store interface - generic CRUD over one named collection
 *
 * Implementations stamp timestamps, serialize exact-precision numbers to
 * strings and wrap every backend failure in a StoreError naming the
 * collection.
 */
export interface RecordStore<T extends StoreRecord> {
  /**
   * Name of the underlying collection (table)
   */
  readonly collection: string;

  /**
   * Insert a record, stamping created_at and updated_at with the same instant
   * @returns the created record, or null when the store wrote no row
   */
  insert(fields: NewRecord<T>): Promise<T | null>;

  /**
   * Partially update a record matched by id.
   * id and created_at are stripped from the fields, updated_at is stamped.
   * @returns the updated record, or null when no row matched
   */
  update(id: string, fields: RecordPatch<T>): Promise<T | null>;

  getById(id: string): Promise<T | null>;

  /**
   * Every record in the collection, in store order
   */
  getAll(): Promise<T[]>;

  /**
   * @returns whether a row was deleted
   */
  delete(id: string): Promise<boolean>;

  /**
   * Equality lookup on a single column
   * @returns the first match or null
   */
  findFirstBy(field: keyof T & string, value: string): Promise<T | null>;

  /**
   * Check if the store is reachable
   */
  isHealthy(): Promise<boolean>;
}
