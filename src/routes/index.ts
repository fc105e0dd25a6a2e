import { Router } from 'express';
import { CountryController } from '../controllers/countryController';
import { messages } from '../utils/messages';
import { createCountryRouter } from './countryRoutes';

export const createRouter = (countryController: CountryController): Router => {
  const router = Router();

  router.get('/api', (req, res) => {
    res.status(200).json({ message: messages.welcome });
  });

  router.get('/api/health', (req, res) => {
    res.status(200).json({ status: 'ok', message: messages.healthy });
  });

  router.use('/', createCountryRouter(countryController));

  return router;
};
