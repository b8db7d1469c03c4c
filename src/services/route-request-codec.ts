/**
 * Route Request Codec - リルート要求URL・レスポンスJSONの相互変換
 */

import { z } from 'zod';
import { DIRECTIONS_CONSTANTS, TRANSIENT_QUERY_PARAMETERS } from '../config/constants.js';
import { RerouteError } from '../errors/RerouteError.js';
import { DirectionsResponseSchema } from '../types/directions.types.js';
import { formatZodErrors } from '../utils/zod.js';
import type {
  Approach,
  Bearing,
  Credentials,
  DecodeResult,
  Route,
  RouteQuery,
  RouteResult,
  RouteWaypoint,
} from '../types/index.js';

export interface DecodedRouteRequest {
  query: RouteQuery;
  credentials: Credentials;
}

const { API_VERSION_PATH, LIST_SEPARATOR, VALUE_SEPARATOR } = DIRECTIONS_CONSTANTS;

const DIRECTIONS_PATH_PATTERN = /\/directions\/v5\/([^/]+)\/([^/]+)\/([^/]+?)(?:\.json)?$/;
const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

const booleanParam = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true')
  .optional();

const listParam = z
  .string()
  .transform((value) =>
    value
      .split(VALUE_SEPARATOR)
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )
  .optional();

const RouteRequestParamsSchema = z.object({
  alternatives: booleanParam,
  steps: booleanParam,
  continue_straight: booleanParam,
  voice_instructions: booleanParam,
  banner_instructions: booleanParam,
  language: z.string().min(1).optional(),
  geometries: z.enum(['geojson', 'polyline', 'polyline6']).optional(),
  overview: z.enum(['full', 'simplified', 'false']).optional(),
  exclude: listParam,
  annotations: listParam,
  avoid_maneuver_radius: z
    .string()
    .regex(/^\d+(\.\d+)?$/, 'Expected a non-negative number')
    .transform(Number)
    .optional(),
  waypoints: z
    .string()
    .regex(/^\d+(;\d+)*$/, 'Expected semicolon-separated waypoint indices')
    .transform((value) => value.split(LIST_SEPARATOR).map(Number))
    .optional(),
  waypoint_names: z.string().optional(),
  bearings: z.string().optional(),
  radiuses: z.string().optional(),
  approaches: z.string().optional(),
});

const KNOWN_PARAMETERS = new Set<string>([
  ...Object.keys(RouteRequestParamsSchema.shape),
  ...TRANSIENT_QUERY_PARAMETERS,
]);

type DecodeFailure = { success: false; error: RerouteError };

function failure(message: string, details?: unknown): DecodeFailure {
  return { success: false, error: RerouteError.invalidResponse(message, details) };
}

function requestFailure(reason: string, details?: unknown): DecodeFailure {
  return failure(`Unable to decode route request: ${reason}`, details);
}

// ============================================
// Request decoding
// ============================================

function parseCoordinate(raw: string): RouteWaypoint['coordinate'] | null {
  const parts = raw.split(VALUE_SEPARATOR);
  if (parts.length !== 2 || !parts.every((part) => DECIMAL_PATTERN.test(part))) {
    return null;
  }

  const [lng, lat] = parts.map(Number);
  if (Math.abs(lng) > 180 || Math.abs(lat) > 90) {
    return null;
  }

  return { lat, lng };
}

function parseBearing(raw: string): Bearing | null {
  const parts = raw.split(VALUE_SEPARATOR);
  if (parts.length !== 2 || !parts.every((part) => DECIMAL_PATTERN.test(part))) {
    return null;
  }

  const [angle, tolerance] = parts.map(Number);
  if (angle < 0 || angle > 360 || tolerance < 0 || tolerance > 180) {
    return null;
  }

  return { angle, tolerance };
}

function parseRadius(raw: string): number | 'unlimited' | null {
  if (raw === 'unlimited') {
    return raw;
  }
  const radius = Number(raw);
  return DECIMAL_PATTERN.test(raw) && radius >= 0 ? radius : null;
}

function parseApproach(raw: string): Approach | null {
  return raw === 'curb' || raw === 'unrestricted' ? raw : null;
}

/**
 * 地点ごとのセミコロン区切りリストを解析する。空要素は未指定として扱う。
 */
function parseWaypointList<T>(
  name: string,
  raw: string | undefined,
  count: number,
  parseItem: (item: string) => T | null
): DecodeResult<Array<T | undefined>, string> {
  if (raw === undefined) {
    return { success: true, data: new Array<T | undefined>(count).fill(undefined) };
  }

  const items = raw.split(LIST_SEPARATOR);
  if (items.length !== count) {
    return {
      success: false,
      error: `${name} has ${items.length} entries for ${count} coordinates`,
    };
  }

  const values: Array<T | undefined> = [];
  for (const item of items) {
    if (item === '') {
      values.push(undefined);
      continue;
    }
    const value = parseItem(item);
    if (value === null) {
      return { success: false, error: `${name} contains an invalid entry "${item}"` };
    }
    values.push(value);
  }

  return { success: true, data: values };
}

function buildEqualityKey(fields: Omit<RouteQuery, 'equalityKey'>): string {
  return JSON.stringify({
    profile: fields.profile,
    waypoints: fields.waypoints.map((waypoint) => [
      waypoint.coordinate.lng,
      waypoint.coordinate.lat,
      waypoint.name ?? null,
      waypoint.bearing ? [waypoint.bearing.angle, waypoint.bearing.tolerance] : null,
      waypoint.radius ?? null,
      waypoint.approach ?? null,
    ]),
    waypointIndices: fields.waypointIndices ?? null,
    alternatives: fields.alternatives ?? null,
    steps: fields.steps ?? null,
    continueStraight: fields.continueStraight ?? null,
    voiceInstructions: fields.voiceInstructions ?? null,
    bannerInstructions: fields.bannerInstructions ?? null,
    language: fields.language ?? null,
    geometries: fields.geometries ?? null,
    overview: fields.overview ?? null,
    exclude: fields.exclude,
    annotations: fields.annotations,
    avoidManeuverRadius: fields.avoidManeuverRadius ?? null,
    additionalParameters: Object.entries(fields.additionalParameters),
  });
}

/**
 * リルート要求URLを RouteQuery と認証情報に変換
 *
 * 例: https://api.mapbox.com/directions/v5/mapbox/driving-traffic/-122.42,37.78;-122.41,37.79?steps=true
 */
export function decodeRequest(serialized: string): DecodeResult<DecodedRouteRequest, RerouteError> {
  let url: URL;
  try {
    url = new URL(serialized);
  } catch {
    return requestFailure('malformed URL');
  }

  const match = DIRECTIONS_PATH_PATTERN.exec(url.pathname);
  if (!match) {
    return requestFailure('path is not a directions request', { path: url.pathname });
  }
  const [, owner, profileName, rawCoordinates] = match;

  let coordinateList: string;
  try {
    coordinateList = decodeURIComponent(rawCoordinates);
  } catch {
    return requestFailure('coordinates are not correctly percent-encoded');
  }

  const coordinates: Array<RouteWaypoint['coordinate']> = [];
  for (const raw of coordinateList.split(LIST_SEPARATOR)) {
    const coordinate = parseCoordinate(raw);
    if (!coordinate) {
      return requestFailure(`invalid coordinate "${raw}"`);
    }
    coordinates.push(coordinate);
  }
  if (coordinates.length < 2) {
    return requestFailure('at least two coordinates are required');
  }

  const parsed = RouteRequestParamsSchema.safeParse(Object.fromEntries(url.searchParams));
  if (!parsed.success) {
    return requestFailure('invalid query parameters', formatZodErrors(parsed.error));
  }
  const params = parsed.data;
  const count = coordinates.length;

  const names = parseWaypointList('waypoint_names', params.waypoint_names, count, (item) => item);
  const bearings = parseWaypointList('bearings', params.bearings, count, parseBearing);
  const radiuses = parseWaypointList('radiuses', params.radiuses, count, parseRadius);
  const approaches = parseWaypointList('approaches', params.approaches, count, parseApproach);
  if (!names.success) {
    return requestFailure(names.error);
  }
  if (!bearings.success) {
    return requestFailure(bearings.error);
  }
  if (!radiuses.success) {
    return requestFailure(radiuses.error);
  }
  if (!approaches.success) {
    return requestFailure(approaches.error);
  }

  const indices = params.waypoints;
  if (
    indices &&
    (indices[0] !== 0 ||
      indices[indices.length - 1] !== count - 1 ||
      indices.some((index, position) => index >= count || (position > 0 && index <= indices[position - 1])))
  ) {
    return requestFailure('waypoint indices must be ascending and include the first and last coordinates');
  }

  const waypoints = coordinates.map((coordinate, index): RouteWaypoint => {
    const name = names.data[index];
    const bearing = bearings.data[index];
    const radius = radiuses.data[index];
    const approach = approaches.data[index];
    return Object.freeze({
      coordinate,
      ...(name !== undefined ? { name } : {}),
      ...(bearing !== undefined ? { bearing } : {}),
      ...(radius !== undefined ? { radius } : {}),
      ...(approach !== undefined ? { approach } : {}),
    });
  });

  const additionalParameters: Record<string, string> = {};
  for (const key of [...url.searchParams.keys()].sort()) {
    const value = url.searchParams.get(key);
    if (!KNOWN_PARAMETERS.has(key) && value !== null) {
      additionalParameters[key] = value;
    }
  }

  const fields: Omit<RouteQuery, 'equalityKey'> = {
    profile: `${owner}/${profileName}`,
    waypoints: Object.freeze(waypoints),
    waypointIndices: indices,
    alternatives: params.alternatives,
    steps: params.steps,
    continueStraight: params.continue_straight,
    voiceInstructions: params.voice_instructions,
    bannerInstructions: params.banner_instructions,
    language: params.language,
    geometries: params.geometries,
    overview: params.overview,
    exclude: params.exclude ?? [],
    annotations: params.annotations ?? [],
    avoidManeuverRadius: params.avoid_maneuver_radius,
    additionalParameters: Object.freeze(additionalParameters),
  };

  return {
    success: true,
    data: {
      query: Object.freeze({ ...fields, equalityKey: buildEqualityKey(fields) }),
      credentials: Object.freeze({
        accessToken: url.searchParams.get('access_token'),
        host: url.origin,
      }),
    },
  };
}

// ============================================
// Request encoding
// ============================================

function setOptional(params: URLSearchParams, name: string, value: string | number | boolean | undefined): void {
  if (value !== undefined) {
    params.set(name, String(value));
  }
}

function setWaypointList(
  params: URLSearchParams,
  name: string,
  waypoints: readonly RouteWaypoint[],
  format: (waypoint: RouteWaypoint) => string | undefined
): void {
  const values = waypoints.map(format);
  if (values.some((value) => value !== undefined)) {
    params.set(name, values.map((value) => value ?? '').join(LIST_SEPARATOR));
  }
}

/**
 * RouteQuery を Directions API のリクエストURLに変換
 */
export function encodeRequest(query: RouteQuery, credentials: Credentials): string {
  const coordinates = query.waypoints
    .map(({ coordinate }) => `${coordinate.lng}${VALUE_SEPARATOR}${coordinate.lat}`)
    .join(LIST_SEPARATOR);
  const url = new URL(`${credentials.host}/${API_VERSION_PATH}/${query.profile}/${coordinates}`);
  const params = url.searchParams;

  setOptional(params, 'alternatives', query.alternatives);
  setOptional(params, 'steps', query.steps);
  setOptional(params, 'continue_straight', query.continueStraight);
  setOptional(params, 'voice_instructions', query.voiceInstructions);
  setOptional(params, 'banner_instructions', query.bannerInstructions);
  setOptional(params, 'language', query.language);
  setOptional(params, 'geometries', query.geometries);
  setOptional(params, 'overview', query.overview);
  if (query.exclude.length > 0) {
    params.set('exclude', query.exclude.join(VALUE_SEPARATOR));
  }
  if (query.annotations.length > 0) {
    params.set('annotations', query.annotations.join(VALUE_SEPARATOR));
  }
  setOptional(params, 'avoid_maneuver_radius', query.avoidManeuverRadius);
  setOptional(params, 'waypoints', query.waypointIndices?.join(LIST_SEPARATOR));

  setWaypointList(params, 'waypoint_names', query.waypoints, (waypoint) => waypoint.name);
  setWaypointList(params, 'bearings', query.waypoints, ({ bearing }) =>
    bearing ? `${bearing.angle}${VALUE_SEPARATOR}${bearing.tolerance}` : undefined
  );
  setWaypointList(params, 'radiuses', query.waypoints, ({ radius }) =>
    radius === undefined ? undefined : String(radius)
  );
  setWaypointList(params, 'approaches', query.waypoints, (waypoint) => waypoint.approach);

  for (const [name, value] of Object.entries(query.additionalParameters)) {
    params.set(name, value);
  }
  if (credentials.accessToken) {
    params.set('access_token', credentials.accessToken);
  }

  return url.toString();
}

// ============================================
// Response decoding
// ============================================

/**
 * Directions レスポンスJSONを、要求に使った RouteQuery と対応付けて RouteResult に変換
 */
export function decodeResponse(
  serialized: string,
  query: RouteQuery,
  credentials: Credentials
): DecodeResult<RouteResult, RerouteError> {
  let json: unknown;
  try {
    json = JSON.parse(serialized);
  } catch (error) {
    return failure('Route response is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = DirectionsResponseSchema.safeParse(json);
  if (!parsed.success) {
    return failure('Route response does not match the directions schema', formatZodErrors(parsed.error));
  }
  const response = parsed.data;

  if (response.code !== 'Ok') {
    return failure(`Directions response returned code ${response.code}`, {
      code: response.code,
      message: response.message,
    });
  }

  if (response.routes.length === 0) {
    return failure('Route response contains no routes');
  }

  const expectedWaypoints = query.waypointIndices?.length ?? query.waypoints.length;
  if (response.waypoints.length !== expectedWaypoints) {
    return failure('Route response waypoints do not match the route request', {
      expected: expectedWaypoints,
      received: response.waypoints.length,
    });
  }

  const routes = response.routes.map(
    (route): Route => ({
      distance: route.distance,
      duration: route.duration,
      weight: route.weight,
      weightName: route.weight_name,
      geometry: route.geometry,
      legs: route.legs,
    })
  );

  return {
    success: true,
    data: Object.freeze({
      identifier: response.uuid ?? null,
      routes,
      waypoints: response.waypoints.map((waypoint) => ({
        name: waypoint.name,
        coordinate: { lng: waypoint.location[0], lat: waypoint.location[1] },
      })),
      query,
      credentials,
    }),
  };
}
