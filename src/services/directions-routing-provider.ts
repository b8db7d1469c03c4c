/**
 * Directions Routing Provider - Directions API によるルート再計算
 */

import { env } from '../config/env.js';
import { RerouteError } from '../errors/RerouteError.js';
import { logger } from '../utils/logger.js';
import { decodeResponse, encodeRequest } from './route-request-codec.js';
import type { Credentials, RouteQuery, RouteResult, RoutingProvider } from '../types/index.js';

const log = logger.child({ module: 'directions-routing-provider' });

export interface DirectionsRoutingProviderOptions {
  accessToken?: string;
  baseUrl?: string;
}

export class DirectionsRoutingProvider implements RoutingProvider {
  private readonly accessToken: string | null;
  private readonly baseUrl: string;

  constructor(options: DirectionsRoutingProviderOptions = {}) {
    this.accessToken = options.accessToken ?? env.DIRECTIONS_ACCESS_TOKEN ?? null;
    this.baseUrl = options.baseUrl ?? env.DIRECTIONS_API_URL;
  }

  async calculateRoutes(query: RouteQuery, signal: AbortSignal): Promise<RouteResult> {
    if (!this.accessToken) {
      throw RerouteError.providerError('DIRECTIONS_ACCESS_TOKEN is not configured');
    }

    const credentials: Credentials = {
      accessToken: this.accessToken,
      host: new URL(this.baseUrl).origin,
    };
    const url = encodeRequest(query, credentials);

    log.debug(
      { profile: query.profile, waypointCount: query.waypoints.length },
      'Requesting directions'
    );

    const response = await fetch(url, { signal });

    if (!response.ok) {
      const errorText = await response.text();
      throw RerouteError.providerError(`Directions API request failed: ${response.status}`, {
        status: response.status,
        body: errorText,
      });
    }

    const decoded = decodeResponse(await response.text(), query, credentials);
    if (!decoded.success) {
      throw RerouteError.providerError(decoded.error.message, decoded.error.details);
    }

    log.debug(
      { identifier: decoded.data.identifier, routeCount: decoded.data.routes.length },
      'Directions received'
    );

    return decoded.data;
  }
}
