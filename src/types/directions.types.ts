/**
 * Directions API レスポンススキーマ
 */

import { z } from 'zod';

const LngLatSchema = z.tuple([z.number(), z.number()]);

const GeometrySchema = z.union([
  z.string(),
  z.object({
    type: z.literal('LineString'),
    coordinates: z.array(LngLatSchema),
  }),
]);

export const DirectionsLegSchema = z.object({
  summary: z.string().default(''),
  distance: z.number().nonnegative(),
  duration: z.number().nonnegative(),
});

export const DirectionsRouteSchema = z.object({
  distance: z.number().nonnegative(),
  duration: z.number().nonnegative(),
  weight: z.number().optional(),
  weight_name: z.string().optional(),
  geometry: GeometrySchema.optional(),
  legs: z.array(DirectionsLegSchema).default([]),
});

export const DirectionsWaypointSchema = z.object({
  name: z.string().default(''),
  location: LngLatSchema,
});

export const DirectionsResponseSchema = z.object({
  code: z.string(),
  message: z.string().optional(),
  uuid: z.string().optional(),
  routes: z.array(DirectionsRouteSchema).default([]),
  waypoints: z.array(DirectionsWaypointSchema).default([]),
});

export type DirectionsResponse = z.infer<typeof DirectionsResponseSchema>;
