import type { DeepPartial, FindOptionsWhere, Repository } from 'typeorm';
import type { IRepository } from '../interfaces/repository.interface';
import type { TimestampedEntity } from './timestamped.entity';

/**
 * TypeORM implementation of IRepository.
 *
 * Subclasses only describe how their criteria map onto a TypeORM `where`
 * clause; every write is a single `save`/`remove` and commits on return.
 */
export abstract class TypeOrmRepository<T extends TimestampedEntity, C>
  implements IRepository<T, C>
{
  /** Columns `update` leaves untouched whatever the caller passes. */
  protected readonly immutableColumns: ReadonlyArray<keyof T> = [
    'id',
    'createdAt',
    'updatedAt',
  ];

  constructor(protected readonly repository: Repository<T>) {}

  protected abstract toWhere(criteria: C): FindOptionsWhere<T>;

  protected abstract byId(id: string): FindOptionsWhere<T>;

  async create(fields: DeepPartial<T>): Promise<T> {
    const instance = this.repository.create(fields);
    return this.repository.save(instance);
  }

  async get(criteria: C): Promise<T | null> {
    return this.repository.findOne({ where: this.toWhere(criteria) });
  }

  async filter(criteria: C): Promise<T[]> {
    return this.repository.find({ where: this.toWhere(criteria) });
  }

  async exists(criteria: C): Promise<boolean> {
    const count = await this.repository.count({
      where: this.toWhere(criteria),
    });
    return count > 0;
  }

  async delete(criteria: C): Promise<boolean> {
    const entity = await this.get(criteria);
    if (!entity) return false;

    await this.repository.remove(entity);
    return true;
  }

  async update(id: string, fields: DeepPartial<T>): Promise<T | null> {
    const entity = await this.repository.findOne({ where: this.byId(id) });
    if (!entity) return null;

    const restore = this.immutableColumns.map((column) =>
      this.pin(entity, column),
    );
    this.repository.merge(entity, fields);
    restore.forEach((put) => put());

    return this.repository.save(entity);
  }

  private pin<K extends keyof T>(entity: T, column: K): () => void {
    const value = entity[column];
    return () => {
      entity[column] = value;
    };
  }
}
