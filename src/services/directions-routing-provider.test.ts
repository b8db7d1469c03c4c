import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DirectionsRoutingProvider } from './directions-routing-provider.js';
import { RerouteCoordinator } from './reroute-coordinator.js';
import { decodeRequest } from './route-request-codec.js';
import { FakeNavigator } from '../testing/fake-navigator.js';
import type { RouteQuery } from '../types/index.js';

const COORDINATES = '-122.4194,37.7749;-122.4089,37.7837';
const REQUEST = `https://api.mapbox.com/directions/v5/mapbox/driving-traffic/${COORDINATES}?access_token=request-token&steps=true&overview=full`;

const RESPONSE = {
  code: 'Ok',
  uuid: 'directions-uuid-7',
  routes: [{ distance: 1520.4, duration: 312.7, legs: [{ summary: 'Market Street', distance: 1520.4, duration: 312.7 }] }],
  waypoints: [
    { name: 'Market Street', location: [-122.4194, 37.7749] },
    { name: 'Mission Street', location: [-122.4089, 37.7837] },
  ],
};

function decodeQuery(url: string): RouteQuery {
  const decoded = decodeRequest(url);
  if (!decoded.success) {
    throw decoded.error;
  }
  return decoded.data.query;
}

describe('DirectionsRoutingProvider', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function createProvider(): DirectionsRoutingProvider {
    return new DirectionsRoutingProvider({
      accessToken: 'test-token',
      baseUrl: 'https://directions.example.test',
    });
  }

  it('requests the encoded query with its own credentials', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify(RESPONSE), { status: 200 }));
    const controller = new AbortController();

    const result = await createProvider().calculateRoutes(decodeQuery(REQUEST), controller.signal);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(
      `https://directions.example.test/directions/v5/mapbox/driving-traffic/${COORDINATES}?steps=true&overview=full&access_token=test-token`
    );
    expect(init?.signal).toBe(controller.signal);
    expect(result.identifier).toBe('directions-uuid-7');
    expect(result.credentials).toEqual({
      accessToken: 'test-token',
      host: 'https://directions.example.test',
    });
  });

  it('rejects with the HTTP status when the API fails', async () => {
    fetchMock.mockResolvedValue(new Response('{"message":"Not Authorized"}', { status: 401 }));

    await expect(
      createProvider().calculateRoutes(decodeQuery(REQUEST), new AbortController().signal)
    ).rejects.toMatchObject({
      code: 'PROVIDER_ERROR',
      message: 'Directions API request failed: 401',
      details: { status: 401, body: '{"message":"Not Authorized"}' },
    });
  });

  it('rejects when the response cannot be decoded', async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ code: 'NoRoute', message: 'No route found' }), { status: 200 })
    );

    await expect(
      createProvider().calculateRoutes(decodeQuery(REQUEST), new AbortController().signal)
    ).rejects.toMatchObject({
      code: 'PROVIDER_ERROR',
      message: 'Directions response returned code NoRoute',
    });
  });

  it('drives a full reroute through the coordinator', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify(RESPONSE), { status: 200 }));
    const navigator = new FakeNavigator();
    const coordinator = new RerouteCoordinator(navigator, {
      settings: { reroutesProactively: true, initialManeuverAvoidanceRadius: 8 },
    });
    const didReceiveReroute = vi.fn();
    coordinator.delegate = {
      didReceiveReroute,
      didCancelReroute: vi.fn(),
      didFailToReroute: vi.fn(),
    };
    coordinator.customRoutingProvider = createProvider();

    navigator.detectOffRoute(REQUEST);
    await vi.waitFor(() => expect(didReceiveReroute).toHaveBeenCalledOnce());

    expect(navigator.callbackResults).toEqual([
      {
        success: true,
        data: { routeResponse: 'directions-uuid-7', routeRequest: REQUEST, origin: 'custom' },
      },
    ]);
    expect(didReceiveReroute.mock.calls[0][0]).toMatchObject({ identifier: 'directions-uuid-7' });
  });
});
