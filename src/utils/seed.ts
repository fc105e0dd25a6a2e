import fs from 'fs/promises';
import path from 'path';
import { CountryService } from '../services/countryService';
import { CountryPayload } from '../types/country';
import { countrySeedSchema } from '../validation/countryValidation';
import { ConflictError } from './errors';
import { logger } from './logger';

export interface SeedResult {
  created: number;
  skipped: number;
}

/**
 * Reads a JSON array of countries and validates it with the request body
 * schema. Relative paths resolve against the working directory.
 */
export const loadSeedFile = async (filePath: string): Promise<CountryPayload[]> => {
  const raw = await fs.readFile(path.resolve(process.cwd(), filePath), 'utf8');
  const parsed: unknown = JSON.parse(raw);
  const result = countrySeedSchema.validate(parsed, {
    abortEarly: false,
    stripUnknown: { objects: true },
  });
  if (result.error) {
    throw new Error(`Invalid seed file ${filePath}: ${result.error.message}`);
  }
  return result.value;
};

// Existing ids are left untouched.
export const seedCountries = async (
  countryService: CountryService,
  countries: CountryPayload[],
): Promise<SeedResult> => {
  const result: SeedResult = { created: 0, skipped: 0 };

  for (const country of countries) {
    try {
      await countryService.createCountry(country);
      result.created++;
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }
      logger.warn(`Seed entry skipped: ${error.message}`);
      result.skipped++;
    }
  }

  logger.info('Country seed applied', { ...result });
  return result;
};
