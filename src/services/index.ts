export { decodeRequest, decodeResponse, encodeRequest, type DecodedRouteRequest } from './route-request-codec.js';
export {
  RerouteCoordinator,
  type RerouteCoordinatorOptions,
  type RerouteSettings,
  type RerouteState,
} from './reroute-coordinator.js';
export {
  DirectionsRoutingProvider,
  type DirectionsRoutingProviderOptions,
} from './directions-routing-provider.js';
