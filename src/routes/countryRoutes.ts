import { Router } from 'express';
import { CountryController } from '../controllers/countryController';
import validateRequest, { validateBody } from '../middlewares/validateRequest';
import {
  countrySchema,
  validateCountryId,
  validateCountryName,
} from '../validation/countryValidation';

/**
 * Country CRUD endpoints. The name lookup is declared before `/:id` so that
 * `countryname` is never read as an id.
 */
export const createCountryRouter = (countryController: CountryController): Router => {
  const router = Router();

  router.get('/getcountries', countryController.getCountries);
  router.get(
    '/getcountries/countryname',
    validateCountryName,
    validateRequest,
    countryController.getCountryByName,
  );
  router.get(
    '/getcountries/:id',
    validateCountryId,
    validateRequest,
    countryController.getCountryById,
  );
  router.post('/addcountry', validateBody(countrySchema), countryController.addCountry);
  router.put(
    '/updatecountry/:id',
    validateCountryId,
    validateRequest,
    validateBody(countrySchema),
    countryController.updateCountry,
  );
  router.delete(
    '/deletecountry/:id',
    validateCountryId,
    validateRequest,
    countryController.deleteCountry,
  );

  return router;
};
