import mongoose, { Schema, Document } from 'mongoose';

export interface ICountry extends Document {
  idCountry: number;
  name: string; // e.g. 'France'
  capital: string; // e.g. 'Paris'
  created_at?: Date;
  updated_at?: Date;
}

/**
 * Mongoose schema for the Country model.
 *
 * `idCountry` is the public key and carries a unique index; `name` is
 * indexed for lookups but may repeat.
 */
const countrySchema: Schema = new Schema(
  {
    idCountry: {
      type: Number,
      required: true,
      unique: true,
      min: [1, 'Country id must be a positive integer'],
    },
    name: {
      type: String,
      required: true,
      trim: true,
      maxlength: [100, 'Country name cannot exceed 100 characters'],
      index: true,
    },
    capital: {
      type: String,
      required: true,
      trim: true,
      maxlength: [100, 'Capital cannot exceed 100 characters'],
    },
  },
  {
    timestamps: {
      createdAt: 'created_at',
      updatedAt: 'updated_at',
    },
  },
);

export const Country = mongoose.model<ICountry>('Country', countrySchema);
