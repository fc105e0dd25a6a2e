import { CountryRepository } from '../repositories/countryRepository';
import { Country, CountryPayload } from '../types/country';
import { NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { messages } from '../utils/messages';

/**
 * The country directory: reads and writes Country records through the
 * injected repository. Every failure is raised as an `AppError` and nothing
 * is written when an operation fails.
 */
export class CountryService {
  constructor(private readonly repository: CountryRepository) {}

  public async listCountries(): Promise<Country[]> {
    return this.repository.findAll();
  }

  public async getCountryById(idCountry: number): Promise<Country> {
    const country = await this.repository.findById(idCountry);
    if (!country) {
      throw new NotFoundError(messages.countryNotFound(idCountry));
    }
    return country;
  }

  public async getCountryByName(name: string): Promise<Country> {
    const country = await this.repository.findByName(name);
    if (!country) {
      throw new NotFoundError(messages.countryNameNotFound(name));
    }
    return country;
  }

  public async createCountry(payload: CountryPayload): Promise<Country> {
    const country = await this.repository.create(
      { name: payload.name, capital: payload.capital },
      payload.idCountry,
    );
    logger.info('Country created', { idCountry: country.idCountry });
    return country;
  }

  // A body id is optional on update, but when present it must match the path.
  public async updateCountry(idCountry: number, payload: CountryPayload): Promise<Country> {
    if (payload.idCountry !== undefined && payload.idCountry !== idCountry) {
      throw new ValidationError(messages.idMismatch(idCountry, payload.idCountry), [
        { param: 'idCountry', message: messages.idMismatch(idCountry, payload.idCountry) },
      ]);
    }

    const country = await this.repository.update(idCountry, {
      name: payload.name,
      capital: payload.capital,
    });
    if (!country) {
      throw new NotFoundError(messages.countryNotFound(idCountry));
    }
    logger.info('Country updated', { idCountry });
    return country;
  }

  public async deleteCountry(idCountry: number): Promise<Country> {
    const country = await this.repository.delete(idCountry);
    if (!country) {
      throw new NotFoundError(messages.countryNotFound(idCountry));
    }
    logger.info('Country deleted', { idCountry });
    return country;
  }
}
