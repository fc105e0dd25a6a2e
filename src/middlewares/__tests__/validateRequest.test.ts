import express, { Request, Response } from 'express';
import request from 'supertest';
import validateRequest, { validateBody } from '../validateRequest';
import errorHandler from '../errorHandler';
import { countrySchema, validateCountryId } from '../../validation/countryValidation';

describe('validateBody middleware', () => {
  const app = express();
  app.use(express.json());

  app.post('/test-country', validateBody(countrySchema), (req, res) => {
    res.status(200).json({ success: true, body: req.body });
  });
  app.use(errorHandler);

  it('should return 200 for valid input', async () => {
    const res = await request(app)
      .post('/test-country')
      .send({ name: 'Peru', capital: 'Lima' });
    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.body).toEqual({ name: 'Peru', capital: 'Lima' });
  });

  it('should report every invalid field', async () => {
    const res = await request(app)
      .post('/test-country')
      .send({ idCountry: -1, name: '' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('ValidationError');
    expect(res.body.details.map((detail: { param: string }) => detail.param)).toEqual([
      'idCountry',
      'name',
      'capital',
    ]);
  });
});

describe('validateRequest middleware', () => {
  const app = express();

  app.get('/test-country/:id', validateCountryId, validateRequest, (req: Request, res: Response) => {
    res.status(200).json({ id: req.params.id });
  });
  app.use(errorHandler);

  it('should let a positive integer id through', async () => {
    const res = await request(app).get('/test-country/12');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id: '12' });
  });

  it('should return 400 for a negative id', async () => {
    const res = await request(app).get('/test-country/-3');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      success: false,
      error: 'ValidationError',
      message: 'Country id must be a positive integer',
      details: [{ param: 'id', message: 'Country id must be a positive integer' }],
    });
  });
});
