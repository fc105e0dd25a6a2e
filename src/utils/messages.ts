export const messages = {
  welcome: 'Welcome to the Country Directory API!',
  healthy: 'API is healthy',
  error: 'An unexpected error occurred. Please try again later',
  routeNotFound: 'Route not found',
  malformedBody: 'Request body is not valid JSON',
  nameQueryRequired: 'Query parameter "name" is required',
  invalidId: 'Country id must be a positive integer',
  countryNotFound: (id: number) => `Country with id ${id} not found`,
  countryNameNotFound: (name: string) => `Country named "${name}" not found`,
  countryExists: (id: number) => `Country with id ${id} already exists`,
  countryDeleted: (id: number) => `Country with id ${id} deleted successfully`,
  idOutOfRange: (id: number) => `Country id ${id} is outside the safe integer range`,
  idMismatch: (pathId: number, bodyId: number) =>
    `Body idCountry ${bodyId} does not match path id ${pathId}`,
};
