/**
 * Place Schema - named fields of a single search result
 *
 * The same shape is used for rows handed to the presentation layer and for
 * JSON output, so it carries no validation beyond types: empty strings and
 * out-of-range coordinates are accepted, matching PlaceRecord construction.
 */

import { z } from 'zod';

export const PlaceFieldsSchema = z.object({
  /** Short place name, e.g. "Berlin" */
  name: z.string(),
  /** Full human-readable label, e.g. "Berlin, Germany" */
  displayLabel: z.string(),
  country: z.string(),
  latitude: z.number(),
  longitude: z.number(),
});

export type PlaceFields = z.infer<typeof PlaceFieldsSchema>;
