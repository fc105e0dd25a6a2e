import mongoose from 'mongoose';
import { Country as CountryModel, ICountry } from '../models/country';
import { Counter } from '../models/counter';
import { Country, CountryFields } from '../types/country';
import { ConflictError } from '../utils/errors';
import { messages } from '../utils/messages';
import { CountryRepository } from './countryRepository';

export const COUNTRY_SEQUENCE = 'country';

const DUPLICATE_KEY = 11000;
const ASSIGN_ATTEMPTS = 3;

export const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY;

export const toCountry = (doc: Pick<ICountry, 'idCountry' | 'name' | 'capital'>): Country => ({
  idCountry: doc.idCountry,
  name: doc.name,
  capital: doc.capital,
});

/**
 * Country storage on MongoDB. Ids come from a `counters` document that is
 * incremented for assigned ids and raised with `$max` before a supplied id
 * is written, so the sequence never hands out an id already in use. Inserts
 * are upserts that only set fields on insert: an existing document with the
 * same id is returned untouched and reported as a conflict.
 */
export class MongoCountryRepository implements CountryRepository {
  async findAll(): Promise<Country[]> {
    const docs = await CountryModel.find().sort({ _id: 1 }).exec();
    return docs.map(toCountry);
  }

  async findById(idCountry: number): Promise<Country | null> {
    const doc = await CountryModel.findOne({ idCountry }).exec();
    return doc ? toCountry(doc) : null;
  }

  async findByName(name: string): Promise<Country | null> {
    const doc = await CountryModel.findOne({ name: { $eq: name } })
      .sort({ _id: 1 })
      .exec();
    return doc ? toCountry(doc) : null;
  }

  async create(fields: CountryFields, idCountry?: number): Promise<Country> {
    if (idCountry !== undefined) {
      if (!Number.isSafeInteger(idCountry)) {
        throw new Error(messages.idOutOfRange(idCountry));
      }
      await Counter.updateOne(
        { _id: COUNTRY_SEQUENCE },
        { $max: { seq: idCountry } },
        { upsert: true },
      ).exec();
      return this.insert(idCountry, fields);
    }

    // An assigned id can still be taken by a supplied one written between $inc and insert.
    for (let attempt = 1; ; attempt++) {
      const id = await this.nextId();
      try {
        return await this.insert(id, fields);
      } catch (error) {
        if (!(error instanceof ConflictError) || attempt >= ASSIGN_ATTEMPTS) {
          throw error;
        }
      }
    }
  }

  async update(idCountry: number, fields: CountryFields): Promise<Country | null> {
    const doc = await CountryModel.findOneAndUpdate(
      { idCountry },
      { name: fields.name, capital: fields.capital },
      { new: true, runValidators: true },
    ).exec();
    return doc ? toCountry(doc) : null;
  }

  async delete(idCountry: number): Promise<Country | null> {
    const doc = await CountryModel.findOneAndDelete({ idCountry }).exec();
    return doc ? toCountry(doc) : null;
  }

  async count(): Promise<number> {
    return CountryModel.countDocuments().exec();
  }

  private async insert(idCountry: number, fields: CountryFields): Promise<Country> {
    try {
      const existing = await CountryModel.findOneAndUpdate(
        { idCountry },
        { $setOnInsert: { name: fields.name, capital: fields.capital } },
        { upsert: true, new: false, runValidators: true },
      ).exec();
      if (existing) {
        throw new ConflictError(messages.countryExists(idCountry));
      }
      return { idCountry, name: fields.name, capital: fields.capital };
    } catch (error) {
      // Two upserts racing on the same id: the unique index rejects the loser.
      if (isDuplicateKeyError(error)) {
        throw new ConflictError(messages.countryExists(idCountry));
      }
      throw error;
    }
  }

  private async nextId(): Promise<number> {
    const counter = await Counter.findOneAndUpdate(
      { _id: COUNTRY_SEQUENCE },
      { $inc: { seq: 1 } },
      { new: true, upsert: true },
    ).exec();
    if (!counter) {
      throw new Error(`Failed to allocate an id from sequence "${COUNTRY_SEQUENCE}"`);
    }
    if (!Number.isSafeInteger(counter.seq)) {
      throw new Error(messages.idOutOfRange(counter.seq));
    }
    return counter.seq;
  }
}
