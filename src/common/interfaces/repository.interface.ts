import type { DeepPartial } from 'typeorm';

/**
 * Entity-agnostic data access contract.
 *
 * `C` is the entity's filter criteria: every field that is set must match
 * (logical AND); an empty criteria object matches every row. Absence is
 * never an error here, callers decide whether a missing row is a 404.
 */
export interface IRepository<T, C> {
  /** Persist a new entity; the store fills the id when it is absent. */
  create(fields: DeepPartial<T>): Promise<T>;

  /** First entity matching the criteria, or null. */
  get(criteria: C): Promise<T | null>;

  /** Every entity matching the criteria, in storage order. */
  filter(criteria: C): Promise<T[]>;

  exists(criteria: C): Promise<boolean>;

  /** Remove the first match. Resolves false when nothing matched. */
  delete(criteria: C): Promise<boolean>;

  /**
   * Overwrite fields of the entity with this id. Immutable columns (id,
   * timestamps, and whatever the implementation adds) are kept. Resolves
   * null when unknown.
   */
  update(id: string, fields: DeepPartial<T>): Promise<T | null>;
}
