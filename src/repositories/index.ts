import { AppConfig } from '../config';
import { connectDB } from '../utils/db';
import { CountryRepository } from './countryRepository';
import { InMemoryCountryRepository } from './inMemoryCountryRepository';
import { MongoCountryRepository } from './mongoCountryRepository';

export type { CountryRepository };
export { InMemoryCountryRepository, MongoCountryRepository };

export const createRepository = async ({
  storage,
}: Pick<AppConfig, 'storage'>): Promise<CountryRepository> => {
  if (storage.backend === 'memory') {
    return new InMemoryCountryRepository();
  }
  if (!storage.mongoUri) {
    throw new Error('MONGODB_URI is required when STORAGE_BACKEND=mongo');
  }
  await connectDB({ uri: storage.mongoUri, dbName: storage.dbName });
  return new MongoCountryRepository();
};
