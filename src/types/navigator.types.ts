/**
 * ナビゲーションエンジン・ルーティングプロバイダー・デリゲート 境界定義
 */

import type { RerouteError, RerouteFailureType } from '../errors/RerouteError.js';
import type { RouteQuery, RouteResult } from './route.types.js';

// ============================================
// Engine → Coordinator
// ============================================

export type RouterOrigin = 'online' | 'onboard' | 'custom';

/**
 * 代替ルートへの切り替え時にエンジンが渡すルート参照
 */
export interface RouteHandle {
  readonly routeId: string;
}

export interface RerouteObserver {
  onRerouteDetected(routeRequest: string): void;
  onRerouteReceived(routeResponse: string, routeRequest: string, origin: RouterOrigin): void;
  onRerouteCancelled(): void;
  onRerouteFailed(message: string, type: RerouteFailureType): void;
  onSwitchToAlternative(route: RouteHandle): void;
}

// ============================================
// Coordinator → Engine
// ============================================

export interface RerouteInfo {
  routeResponse: string;
  routeRequest: string;
  origin: RouterOrigin;
}

export interface RerouteFailure {
  message: string;
  type: RerouteFailureType;
}

export type RerouteCallbackResult =
  | { success: true; data: RerouteInfo }
  | { success: false; error: RerouteFailure };

export type RerouteCallback = (result: RerouteCallbackResult) => void;

export interface RerouteControllerInterface {
  reroute(url: string, callback: RerouteCallback): void;
  cancel(): void;
}

export interface RerouteDetectorInterface {
  isReroute(): boolean;
  forceReroute(): void;
}

export interface NavigatorConfig {
  avoidManeuverSeconds?: number;
}

/**
 * コーディネーターが利用するナビゲーションエンジンの操作
 *
 * addRerouteObserver は登録解除用の関数を返す。
 */
export interface NavigatorEngine {
  addRerouteObserver(observer: RerouteObserver): () => void;
  setRerouteController(controller: RerouteControllerInterface): void;
  getRerouteController(): RerouteControllerInterface;
  getRerouteDetector(): RerouteDetectorInterface;
}

// ============================================
// Routing Provider
// ============================================

/**
 * 差し替え可能なルート計算器
 *
 * signal が中断されたら処理を打ち切ること。ただし中断後に解決しても
 * コーディネーター側で破棄される。
 */
export interface RoutingProvider {
  calculateRoutes(query: RouteQuery, signal: AbortSignal): Promise<RouteResult>;
}

export type ControllerMode =
  | { kind: 'default' }
  | { kind: 'custom'; provider: RoutingProvider };

// ============================================
// Coordinator → Delegate
// ============================================

export interface RerouteDelegate {
  didDetectReroute?(): void;
  didReceiveReroute(result: RouteResult, query: RouteQuery): void;
  didCancelReroute(): void;
  didFailToReroute(error: RerouteError): void;
}
