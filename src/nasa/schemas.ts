/**
 * Response schemas for the NASA and Exoplanet Archive APIs
 *
 * Only the fields the loader stores are declared; everything else passes
 * through unchecked.
 */

import { z } from 'zod';
import { parseDecimal } from '../loader/schemas.js';

const optionalNumber = z.number().nullish();

/** Numbers that some endpoints serialize as strings */
const numeric = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    return parseDecimal(value);
  });

export const ApodResponseSchema = z.object({
  date: z.string(),
  title: z.string().nullish(),
  explanation: z.string().nullish(),
  url: z.string().nullish(),
  media_type: z.string().nullish(),
});

export type ApodResponse = z.infer<typeof ApodResponseSchema>;

const NeoObjectSchema = z.object({
  name: z.string(),
  estimated_diameter: z
    .object({
      kilometers: z.object({ estimated_diameter_max: optionalNumber }).nullish(),
    })
    .nullish(),
  is_potentially_hazardous_asteroid: z.boolean().nullish(),
  close_approach_data: z
    .array(
      z.object({
        relative_velocity: z.object({ kilometers_per_second: numeric }).nullish(),
      })
    )
    .nullish(),
});

export type NeoObject = z.infer<typeof NeoObjectSchema>;

export const NeoFeedResponseSchema = z.object({
  near_earth_objects: z.record(z.string(), z.array(NeoObjectSchema)),
});

export const ExoplanetRowSchema = z.object({
  pl_name: z.string(),
  sy_pnum: optionalNumber,
  pl_rade: optionalNumber,
  pl_bmasse: optionalNumber,
  sy_dist: optionalNumber,
  disc_year: optionalNumber,
});

export const ExoplanetResponseSchema = z.array(ExoplanetRowSchema);

export type ExoplanetRow = z.infer<typeof ExoplanetRowSchema>;
