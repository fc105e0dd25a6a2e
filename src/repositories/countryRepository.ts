import { Country, CountryFields } from '../types/country';

/**
 * Storage capability behind the country service.
 *
 * Implementations keep records in insertion order and apply every write to a
 * single record atomically: a concurrent read sees the record either before
 * or after the write, never in between.
 */
export interface CountryRepository {
  findAll(): Promise<Country[]>;
  findById(idCountry: number): Promise<Country | null>;
  /** Earliest-inserted record whose name matches exactly. */
  findByName(name: string): Promise<Country | null>;
  /**
   * Stores a new record. When `idCountry` is omitted the next id in the
   * sequence is assigned. Throws `ConflictError` if the id is taken.
   */
  create(fields: CountryFields, idCountry?: number): Promise<Country>;
  update(idCountry: number, fields: CountryFields): Promise<Country | null>;
  delete(idCountry: number): Promise<Country | null>;
  count(): Promise<number>;
}
