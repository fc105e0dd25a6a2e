export interface CountryFields {
  name: string;
  capital: string;
}

export interface Country extends CountryFields {
  idCountry: number;
}

/** Request body for create and update; the id is optional on both. */
export interface CountryPayload extends CountryFields {
  idCountry?: number;
}

// Leaves room for one more assigned id that is still a safe integer.
export const MAX_SUPPLIED_ID = Number.MAX_SAFE_INTEGER - 1;

export type CountryMutation = 'create' | 'update' | 'delete';
