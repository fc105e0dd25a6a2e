import mongoose from 'mongoose';
import { Country as CountryModel } from '../../models/country';
import { Counter } from '../../models/counter';
import { ConflictError } from '../../utils/errors';
import {
  COUNTRY_SEQUENCE,
  MongoCountryRepository,
  isDuplicateKeyError,
  toCountry,
} from '../mongoCountryRepository';

const duplicateKeyError = () =>
  new mongoose.mongo.MongoServerError({
    message: 'E11000 duplicate key error collection: countrydb.countries',
    code: 11000,
  });

describe('mongoCountryRepository helpers', () => {
  it('should recognise a duplicate key error', () => {
    expect(isDuplicateKeyError(duplicateKeyError())).toBe(true);
  });

  it('should not treat other server errors as duplicates', () => {
    const error = new mongoose.mongo.MongoServerError({ message: 'not primary', code: 10107 });

    expect(isDuplicateKeyError(error)).toBe(false);
    expect(isDuplicateKeyError(new Error('E11000'))).toBe(false);
  });

  it('should map a document to the API shape', () => {
    expect(toCountry({ idCountry: 4, name: 'Canada', capital: 'Ottawa' })).toEqual({
      idCountry: 4,
      name: 'Canada',
      capital: 'Ottawa',
    });
  });
});

// Queries are built for real; only their execution is replaced.
describe('MongoCountryRepository', () => {
  let repository: MongoCountryRepository;
  let exec: jest.SpyInstance;
  let raiseCounter: jest.SpyInstance;
  let incrementCounter: jest.SpyInstance;
  let upsertCountry: jest.SpyInstance;

  beforeEach(() => {
    repository = new MongoCountryRepository();
    exec = jest
      .spyOn(mongoose.Query.prototype, 'exec')
      .mockRejectedValue(new Error('no database in tests'));
    raiseCounter = jest.spyOn(Counter, 'updateOne');
    incrementCounter = jest.spyOn(Counter, 'findOneAndUpdate');
    upsertCountry = jest.spyOn(CountryModel, 'findOneAndUpdate');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('create with a supplied id', () => {
    it('should raise the counter before inserting', async () => {
      exec.mockResolvedValueOnce({ acknowledged: true }).mockResolvedValueOnce(null);

      const created = await repository.create({ name: 'Mali', capital: 'Bamako' }, 12);

      expect(created).toEqual({ idCountry: 12, name: 'Mali', capital: 'Bamako' });
      expect(raiseCounter).toHaveBeenCalledWith(
        { _id: COUNTRY_SEQUENCE },
        { $max: { seq: 12 } },
        { upsert: true },
      );
      expect(upsertCountry).toHaveBeenCalledWith(
        { idCountry: 12 },
        { $setOnInsert: { name: 'Mali', capital: 'Bamako' } },
        { upsert: true, new: false, runValidators: true },
      );
      expect(raiseCounter.mock.invocationCallOrder[0]).toBeLessThan(
        upsertCountry.mock.invocationCallOrder[0],
      );
    });

    it('should not insert when raising the counter fails', async () => {
      exec.mockRejectedValueOnce(new Error('counter unavailable'));

      await expect(repository.create({ name: 'Mali', capital: 'Bamako' }, 12)).rejects.toThrow(
        'counter unavailable',
      );
      expect(upsertCountry).not.toHaveBeenCalled();
    });

    it('should report an existing document as a conflict', async () => {
      exec
        .mockResolvedValueOnce({ acknowledged: true })
        .mockResolvedValueOnce({ idCountry: 12, name: 'Peru', capital: 'Lima' });

      const result = repository.create({ name: 'Mali', capital: 'Bamako' }, 12);

      await expect(result).rejects.toBeInstanceOf(ConflictError);
      await expect(result).rejects.toThrow('Country with id 12 already exists');
    });

    it('should report a duplicate key error as a conflict', async () => {
      exec.mockResolvedValueOnce({ acknowledged: true }).mockRejectedValueOnce(duplicateKeyError());

      await expect(
        repository.create({ name: 'Mali', capital: 'Bamako' }, 12),
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it('should reject an id outside the safe integer range without touching the database', async () => {
      await expect(
        repository.create({ name: 'Mali', capital: 'Bamako' }, 2 ** 53),
      ).rejects.toThrow('Country id 9007199254740992 is outside the safe integer range');
      expect(exec).not.toHaveBeenCalled();
    });
  });

  describe('create with an assigned id', () => {
    it('should take the next value of the sequence', async () => {
      exec.mockResolvedValueOnce({ _id: COUNTRY_SEQUENCE, seq: 7 }).mockResolvedValueOnce(null);

      const created = await repository.create({ name: 'Mali', capital: 'Bamako' });

      expect(created).toEqual({ idCountry: 7, name: 'Mali', capital: 'Bamako' });
      expect(incrementCounter).toHaveBeenCalledWith(
        { _id: COUNTRY_SEQUENCE },
        { $inc: { seq: 1 } },
        { new: true, upsert: true },
      );
    });

    it('should move on to the next id when the assigned one is taken', async () => {
      exec
        .mockResolvedValueOnce({ _id: COUNTRY_SEQUENCE, seq: 7 })
        .mockResolvedValueOnce({ idCountry: 7, name: 'Peru', capital: 'Lima' })
        .mockResolvedValueOnce({ _id: COUNTRY_SEQUENCE, seq: 8 })
        .mockRejectedValueOnce(duplicateKeyError())
        .mockResolvedValueOnce({ _id: COUNTRY_SEQUENCE, seq: 9 })
        .mockResolvedValueOnce(null);

      const created = await repository.create({ name: 'Mali', capital: 'Bamako' });

      expect(created.idCountry).toBe(9);
      expect(incrementCounter).toHaveBeenCalledTimes(3);
    });

    it('should give up after three taken ids', async () => {
      exec
        .mockResolvedValueOnce({ _id: COUNTRY_SEQUENCE, seq: 1 })
        .mockResolvedValueOnce({ idCountry: 1, name: 'Peru', capital: 'Lima' })
        .mockResolvedValueOnce({ _id: COUNTRY_SEQUENCE, seq: 2 })
        .mockResolvedValueOnce({ idCountry: 2, name: 'Chile', capital: 'Santiago' })
        .mockResolvedValueOnce({ _id: COUNTRY_SEQUENCE, seq: 3 })
        .mockResolvedValueOnce({ idCountry: 3, name: 'Bolivia', capital: 'Sucre' });

      await expect(repository.create({ name: 'Mali', capital: 'Bamako' })).rejects.toThrow(
        'Country with id 3 already exists',
      );
      expect(incrementCounter).toHaveBeenCalledTimes(3);
    });

    it('should refuse a sequence value past the safe integer range', async () => {
      exec.mockResolvedValueOnce({ _id: COUNTRY_SEQUENCE, seq: 2 ** 53 });

      await expect(repository.create({ name: 'Mali', capital: 'Bamako' })).rejects.toThrow(
        'Country id 9007199254740992 is outside the safe integer range',
      );
      expect(upsertCountry).not.toHaveBeenCalled();
    });
  });

  describe('reads and writes of missing records', () => {
    it('should return null from findById, update and delete', async () => {
      exec.mockResolvedValueOnce(null).mockResolvedValueOnce(null).mockResolvedValueOnce(null);

      expect(await repository.findById(5)).toBeNull();
      expect(await repository.update(5, { name: 'Mali', capital: 'Bamako' })).toBeNull();
      expect(await repository.delete(5)).toBeNull();
    });
  });

  it('should map found documents to the API shape', async () => {
    exec.mockResolvedValueOnce([
      { idCountry: 1, name: 'France', capital: 'Paris', createdAt: new Date(0) },
      { idCountry: 2, name: 'Chile', capital: 'Santiago', createdAt: new Date(0) },
    ]);

    expect(await repository.findAll()).toEqual([
      { idCountry: 1, name: 'France', capital: 'Paris' },
      { idCountry: 2, name: 'Chile', capital: 'Santiago' },
    ]);
  });
});
