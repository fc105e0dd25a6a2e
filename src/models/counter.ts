import mongoose, { Schema, Document } from 'mongoose';

// One document per sequence; `_id` is the sequence name.
export interface ICounter extends Document<string> {
  seq: number;
}

const counterSchema: Schema = new Schema(
  {
    _id: { type: String, required: true },
    seq: { type: Number, required: true, default: 0 },
  },
  { versionKey: false },
);

export const Counter = mongoose.model<ICounter>('Counter', counterSchema);
