import { Logger } from '@nestjs/common';
import { DataSource, EntityTarget, ObjectLiteral, Repository } from 'typeorm';
import {
  NewRecord,
  RecordPatch,
  RecordStore,
  RowDecoder,
  StoreError,
  StoreRecord,
  prepareInsertRow,
  prepareUpdateRow,
} from '../../../core';

/**
 * TypeORM implementation of RecordStore
 *
 * Works through the repository of an entity whose property names are the
 * record's field names, so rows travel without a mapping layer; the entity
 * metadata rejects unknown fields.
 */
export class TypeORMRecordStore<T extends StoreRecord>
  implements RecordStore<T>
{
  private readonly logger = new Logger(TypeORMRecordStore.name);
  private readonly repository: Repository<ObjectLiteral>;

  readonly collection: string;

  constructor(
    private readonly dataSource: DataSource,
    entity: EntityTarget<ObjectLiteral>,
    private readonly decode: RowDecoder<T>,
    private readonly options: { now?: () => Date } = {},
  ) {
    this.repository = dataSource.getRepository(entity);
    this.collection = this.repository.metadata.tableName;
  }

  async insert(fields: NewRecord<T>): Promise<T | null> {
    return this.execute('insert into', async () => {
      await this.repository.insert(prepareInsertRow(fields, this.now()));
      return this.findOneBy('id', fields.id);
    });
  }

  async update(id: string, fields: RecordPatch<T>): Promise<T | null> {
    return this.execute('update', async () => {
      const result = await this.repository.update(
        { id },
        prepareUpdateRow(fields, this.now()),
      );
      if (result.affected === 0) {
        return null;
      }
      return this.findOneBy('id', id);
    });
  }

  async getById(id: string): Promise<T | null> {
    return this.execute('fetch from', () => this.findOneBy('id', id));
  }

  async getAll(): Promise<T[]> {
    return this.execute('get all from', async () => {
      const entities = await this.repository.find();
      return entities.map((entity) => this.decode(entity));
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.execute('delete from', async () => {
      const result = await this.repository.delete({ id });
      return (result.affected ?? 0) > 0;
    });
  }

  async findFirstBy(field: keyof T & string, value: string): Promise<T | null> {
    return this.execute(`fetch by ${field} from`, () =>
      this.findOneBy(field, value),
    );
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(
        `Health check failed for ${this.collection}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  private async findOneBy(field: string, value: string): Promise<T | null> {
    const entity = await this.repository.findOne({ where: { [field]: value } });
    return entity ? this.decode(entity) : null;
  }

  private async execute<R>(operation: string, work: () => Promise<R>): Promise<R> {
    try {
      return await work();
    } catch (error) {
      throw new StoreError(this.collection, operation, error);
    }
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }
}
