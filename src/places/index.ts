/**
 * Places Module Exports
 *
 * @module places
 */

export { PlaceRecord } from './record.js';
export type { PlaceFields } from '../schemas/place.js';
