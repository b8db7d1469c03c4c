export type * from './route.types.js';
export type * from './navigator.types.js';
export { DirectionsResponseSchema, type DirectionsResponse } from './directions.types.js';
