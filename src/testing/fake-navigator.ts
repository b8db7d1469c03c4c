/**
 * テスト用のナビゲーションエンジン・ルーティングプロバイダー
 */

import type {
  NavigatorEngine,
  RerouteCallbackResult,
  RerouteControllerInterface,
  RerouteDetectorInterface,
  RerouteObserver,
  RouteHandle,
  RouteQuery,
  RouteResult,
  RoutingProvider,
} from '../types/index.js';

export class FakeDefaultController implements RerouteControllerInterface {
  readonly requests: string[] = [];
  cancelCount = 0;

  reroute(url: string): void {
    this.requests.push(url);
  }

  cancel(): void {
    this.cancelCount += 1;
  }
}

export class FakeRerouteDetector implements RerouteDetectorInterface {
  offRoute = false;
  forcedCount = 0;

  isReroute(): boolean {
    return this.offRoute;
  }

  forceReroute(): void {
    this.forcedCount += 1;
  }
}

/**
 * 逸脱検知 → コントローラーへの要求 → オブザーバーへの結果通知、という
 * ネイティブエンジンの流れをプロセス内で再現する
 */
export class FakeNavigator implements NavigatorEngine {
  readonly observers = new Set<RerouteObserver>();
  readonly defaultController = new FakeDefaultController();
  readonly detector = new FakeRerouteDetector();
  readonly callbackResults: RerouteCallbackResult[] = [];
  controller: RerouteControllerInterface = this.defaultController;

  addRerouteObserver(observer: RerouteObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  setRerouteController(controller: RerouteControllerInterface): void {
    this.controller = controller;
  }

  getRerouteController(): RerouteControllerInterface {
    return this.defaultController;
  }

  getRerouteDetector(): RerouteDetectorInterface {
    return this.detector;
  }

  detectOffRoute(routeRequest: string): void {
    for (const observer of this.observers) {
      observer.onRerouteDetected(routeRequest);
    }
    this.requestReroute(routeRequest);
  }

  requestReroute(routeRequest: string): void {
    this.controller.reroute(routeRequest, (result) => {
      this.callbackResults.push(result);
      for (const observer of this.observers) {
        if (result.success) {
          observer.onRerouteReceived(
            result.data.routeResponse,
            result.data.routeRequest,
            result.data.origin
          );
        } else {
          observer.onRerouteFailed(result.error.message, result.error.type);
        }
      }
    });
  }

  cancelReroute(): void {
    for (const observer of this.observers) {
      observer.onRerouteCancelled();
    }
  }

  switchToAlternative(route: RouteHandle): void {
    for (const observer of this.observers) {
      observer.onSwitchToAlternative(route);
    }
  }
}

export interface DeferredCalculation {
  query: RouteQuery;
  signal: AbortSignal;
  resolve: (result: RouteResult) => void;
  reject: (error: unknown) => void;
}

/**
 * 呼び出しを保留し、テストから任意のタイミングで完了させるプロバイダー
 */
export class DeferredRoutingProvider implements RoutingProvider {
  readonly calls: DeferredCalculation[] = [];

  calculateRoutes(query: RouteQuery, signal: AbortSignal): Promise<RouteResult> {
    return new Promise<RouteResult>((resolve, reject) => {
      this.calls.push({ query, signal, resolve, reject });
    });
  }
}

/**
 * 保留中のPromiseコールバックをすべて実行させる
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function createRouteResult(query: RouteQuery, identifier: string | null): RouteResult {
  return {
    identifier,
    routes: [{ distance: 1520.4, duration: 312.7, legs: [{ summary: 'Market Street', distance: 1520.4, duration: 312.7 }] }],
    waypoints: query.waypoints.map((waypoint, index) => ({
      name: waypoint.name ?? `waypoint-${index}`,
      coordinate: waypoint.coordinate,
    })),
    query,
    credentials: { accessToken: 'test-token', host: 'https://api.example.test' },
  };
}
