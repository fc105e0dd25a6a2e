import { param, query } from 'express-validator';
import Joi from 'joi';
import { CountryPayload, MAX_SUPPLIED_ID } from '../types/country';
import { messages } from '../utils/messages';

export const validateCountryId = [
  param('id').isInt({ min: 1 }).withMessage(messages.invalidId),
];

export const validateCountryName = [
  query('name')
    .isString()
    .withMessage(messages.nameQueryRequired)
    .bail()
    .notEmpty()
    .withMessage(messages.nameQueryRequired),
];

export const countrySchema = Joi.object<CountryPayload>({
  idCountry: Joi.number().integer().min(1).max(MAX_SUPPLIED_ID),
  name: Joi.string().trim().min(1).max(100).required(),
  capital: Joi.string().trim().min(1).max(100).required(),
});

export const countrySeedSchema = Joi.array<CountryPayload[]>().items(countrySchema.required());
