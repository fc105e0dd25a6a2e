import { Request, Response, NextFunction } from 'express';
import { CountryService } from '../services/countryService';
import { CountryPayload } from '../types/country';
import { ValidationError } from '../utils/errors';
import { messages } from '../utils/messages';
import { AppMetrics, recordMutation } from '../utils/metrics';

interface CountryRequest extends Request {
  body: CountryPayload;
}

const parseId = (raw: string): number => {
  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(messages.invalidId, [{ param: 'id', message: messages.invalidId }]);
  }
  return id;
};

export const createCountryController = (countryService: CountryService, metrics: AppMetrics) => {
  const getCountries = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const countries = await countryService.listCountries();
      res.status(200).json(countries);
    } catch (error) {
      next(error);
    }
  };

  const getCountryById = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const country = await countryService.getCountryById(parseId(req.params.id));
      res.status(200).json(country);
    } catch (error) {
      next(error);
    }
  };

  const getCountryByName = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = req.query;
      if (typeof name !== 'string' || name.length === 0) {
        throw new ValidationError(messages.nameQueryRequired, [
          { param: 'name', message: messages.nameQueryRequired },
        ]);
      }
      const country = await countryService.getCountryByName(name);
      res.status(200).json(country);
    } catch (error) {
      next(error);
    }
  };

  const addCountry = async (req: CountryRequest, res: Response, next: NextFunction) => {
    try {
      const country = await countryService.createCountry(req.body);
      recordMutation(metrics, 'create');
      res.status(201).json(country);
    } catch (error) {
      next(error);
    }
  };

  const updateCountry = async (req: CountryRequest, res: Response, next: NextFunction) => {
    try {
      const country = await countryService.updateCountry(parseId(req.params.id), req.body);
      recordMutation(metrics, 'update');
      res.status(200).json(country);
    } catch (error) {
      next(error);
    }
  };

  const deleteCountry = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { idCountry } = await countryService.deleteCountry(parseId(req.params.id));
      recordMutation(metrics, 'delete');
      res.status(200).json({ message: messages.countryDeleted(idCountry), idCountry });
    } catch (error) {
      next(error);
    }
  };

  return {
    getCountries,
    getCountryById,
    getCountryByName,
    addCountry,
    updateCountry,
    deleteCountry,
  };
};

export type CountryController = ReturnType<typeof createCountryController>;
