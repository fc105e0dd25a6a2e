import { Country, CountryFields } from '../types/country';
import { ConflictError } from '../utils/errors';
import { messages } from '../utils/messages';
import { CountryRepository } from './countryRepository';

const copy = (country: Country): Country => ({ ...country });

export class InMemoryCountryRepository implements CountryRepository {
  // Map iteration follows insertion order, and set() on an existing key keeps its slot.
  private readonly countries = new Map<number, Country>();
  private sequence = 0;

  constructor(seed: Country[] = []) {
    for (const country of seed) {
      this.insert(country);
    }
  }

  async findAll(): Promise<Country[]> {
    return Array.from(this.countries.values(), copy);
  }

  async findById(idCountry: number): Promise<Country | null> {
    const country = this.countries.get(idCountry);
    return country ? copy(country) : null;
  }

  async findByName(name: string): Promise<Country | null> {
    for (const country of this.countries.values()) {
      if (country.name === name) {
        return copy(country);
      }
    }
    return null;
  }

  async create(fields: CountryFields, idCountry?: number): Promise<Country> {
    const id = idCountry ?? this.sequence + 1;
    if (!Number.isSafeInteger(id)) {
      throw new Error(messages.idOutOfRange(id));
    }
    return copy(this.insert({ idCountry: id, name: fields.name, capital: fields.capital }));
  }

  async update(idCountry: number, fields: CountryFields): Promise<Country | null> {
    if (!this.countries.has(idCountry)) {
      return null;
    }
    const updated: Country = { idCountry, name: fields.name, capital: fields.capital };
    this.countries.set(idCountry, updated);
    return copy(updated);
  }

  async delete(idCountry: number): Promise<Country | null> {
    const existing = this.countries.get(idCountry);
    if (!existing) {
      return null;
    }
    this.countries.delete(idCountry);
    return existing;
  }

  async count(): Promise<number> {
    return this.countries.size;
  }

  private insert(country: Country): Country {
    if (this.countries.has(country.idCountry)) {
      throw new ConflictError(messages.countryExists(country.idCountry));
    }
    const stored = { ...country };
    this.countries.set(stored.idCountry, stored);
    this.sequence = Math.max(this.sequence, stored.idCountry);
    return stored;
  }
}
