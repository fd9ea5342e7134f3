import {
  NewRecord,
  RecordPatch,
  RecordStore,
  RowDecoder,
  StoreError,
  StoreRecord,
  prepareInsertRow,
  prepareUpdateRow,
  serializeFields,
} from '../../../core';

/**
 * Mock record store for testing and local runs
 * Provides in-memory storage with the same semantics as the TypeORM store
 */
export class MockRecordStore<T extends StoreRecord> implements RecordStore<T> {
  private rows: Map<string, Record<string, unknown>> = new Map();

  // Failure injection
  private pendingFailure: Error | null = null;

  constructor(
    readonly collection: string,
    private readonly decode: RowDecoder<T>,
    private readonly options: MockRecordStoreOptions = {},
  ) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      ...options,
    };
  }

  async insert(fields: NewRecord<T>): Promise<T | null> {
    return this.run('insert into', () => {
      if (this.rows.has(fields.id)) {
        throw new Error(
          `duplicate key value violates unique constraint "${this.collection}_pkey"`,
        );
      }

      const row = prepareInsertRow(fields, this.now());
      this.rows.set(fields.id, row);
      return this.decode({ ...row });
    });
  }

  async update(id: string, fields: RecordPatch<T>): Promise<T | null> {
    return this.run('update', () => {
      const existing = this.rows.get(id);
      if (!existing) {
        return null;
      }

      const row = { ...existing, ...prepareUpdateRow(fields, this.now()) };
      this.rows.set(id, row);
      return this.decode({ ...row });
    });
  }

  async getById(id: string): Promise<T | null> {
    return this.run('fetch from', () => {
      const row = this.rows.get(id);
      return row ? this.decode({ ...row }) : null;
    });
  }

  async getAll(): Promise<T[]> {
    return this.run('get all from', () =>
      Array.from(this.rows.values()).map((row) => this.decode({ ...row })),
    );
  }

  async delete(id: string): Promise<boolean> {
    return this.run('delete from', () => this.rows.delete(id));
  }

  async findFirstBy(field: keyof T & string, value: string): Promise<T | null> {
    return this.run(`fetch by ${field} from`, () => {
      for (const row of this.rows.values()) {
        if (row[field] === value) {
          return this.decode({ ...row });
        }
      }
      return null;
    });
  }

  async isHealthy(): Promise<boolean> {
    return this.pendingFailure === null;
  }

  // ==================== Test Helpers ====================

  /**
   * Place rows directly in the store, bypassing timestamp stamping
   */
  seed(...records: Array<NewRecord<T> & Partial<StoreRecord>>): void {
    for (const record of records) {
      this.rows.set(record.id, serializeFields(record));
    }
  }

  /**
   * Make the next operation fail as if the backend had rejected it
   */
  failNextWith(error: Error): void {
    this.pendingFailure = error;
  }

  /**
   * Clear all data
   */
  clear(): void {
    this.rows.clear();
    this.pendingFailure = null;
  }

  get size(): number {
    return this.rows.size;
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  private async run<R>(operation: string, work: () => R): Promise<R> {
    await this.simulateLatency();

    try {
      if (this.pendingFailure) {
        const failure = this.pendingFailure;
        this.pendingFailure = null;
        throw failure;
      }
      return work();
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      throw new StoreError(this.collection, operation, error);
    }
  }

  /**
   * Simulate network latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }
}

/**
 * Mock record store configuration options
 */
export interface MockRecordStoreOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
  /**
   * Clock used for created_at/updated_at stamps
   */
  now?: () => Date;
}
