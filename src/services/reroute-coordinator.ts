/**
 * Reroute Coordinator - リルートのライフサイクル管理
 *
 * エンジンの逸脱検知を受けてルーティングプロバイダーへ再計算を要求し、
 * 結果をエンジン経由でデリゲートへ通知する。
 *
 * 状態遷移はすべて同期処理で完結し、プロバイダー呼び出しの await を跨がない。
 * プロバイダーの完了は世代番号で照合し、取り消し済み・置き換え済みの要求の完了は破棄する。
 */

import { REROUTE_DEFAULTS, REROUTE_MESSAGES } from '../config/constants.js';
import { env } from '../config/env.js';
import { RerouteError, type RerouteFailureType } from '../errors/RerouteError.js';
import { logger } from '../utils/logger.js';
import { decodeRequest, decodeResponse } from './route-request-codec.js';
import type {
  ControllerMode,
  NavigatorConfig,
  NavigatorEngine,
  RerouteCallback,
  RerouteControllerInterface,
  RerouteDelegate,
  RerouteDetectorInterface,
  RerouteObserver,
  RouteHandle,
  RouteQuery,
  RouteResult,
  RouterOrigin,
  RoutingProvider,
} from '../types/index.js';

const log = logger.child({ module: 'reroute-coordinator' });

export type RerouteState =
  | 'idle'
  | 'detecting'
  | 'requesting'
  | 'cancelled'
  | 'failed'
  | 'succeeded';

export interface RerouteSettings {
  reroutesProactively: boolean;
  initialManeuverAvoidanceRadius: number;
}

export interface RerouteCoordinatorOptions {
  config?: NavigatorConfig;
  /** 起動時の設定。未指定の項目は環境変数から読む */
  settings?: Partial<RerouteSettings>;
}

interface PendingRequest {
  generation: number;
  controller: AbortController;
  query: RouteQuery;
}

interface RecentAcceptance {
  query: RouteQuery;
  result: RouteResult;
  identifier: string;
}

function assertRadius(seconds: number): void {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw RerouteError.invalidConfiguration(
      'Maneuver avoidance radius must be a non-negative number of seconds',
      { seconds }
    );
  }
}

export class RerouteCoordinator implements RerouteObserver, RerouteControllerInterface {
  delegate: RerouteDelegate | null = null;

  private navigator: NavigatorEngine | null;
  private removeObserver: (() => void) | null;
  private readonly defaultRerouteController: RerouteControllerInterface;
  private readonly rerouteDetector: RerouteDetectorInterface;
  private readonly config: NavigatorConfig;
  private readonly initialSettings: RerouteSettings;

  private proactive: boolean;
  private controllerMode: ControllerMode = { kind: 'default' };
  private pendingRequest: PendingRequest | null = null;
  private recentAcceptance: RecentAcceptance | null = null;
  private isCancelled = false;
  private generation = 0;
  private currentState: RerouteState = 'idle';

  constructor(navigator: NavigatorEngine, options: RerouteCoordinatorOptions = {}) {
    this.initialSettings = {
      reroutesProactively: options.settings?.reroutesProactively ?? env.REROUTE_PROACTIVELY,
      initialManeuverAvoidanceRadius:
        options.settings?.initialManeuverAvoidanceRadius ?? env.MANEUVER_AVOIDANCE_RADIUS,
    };
    assertRadius(this.initialSettings.initialManeuverAvoidanceRadius);

    this.navigator = navigator;
    this.config = options.config ?? {};
    this.proactive = this.initialSettings.reroutesProactively;
    this.defaultRerouteController = navigator.getRerouteController();
    this.rerouteDetector = navigator.getRerouteDetector();
    this.removeObserver = navigator.addRerouteObserver(this);
  }

  // ============================================
  // Configuration
  // ============================================

  get reroutesProactively(): boolean {
    return this.proactive;
  }

  set reroutesProactively(value: boolean) {
    this.proactive = value;
    if (!value) {
      this.abortPendingRequest('proactive rerouting disabled');
    }
  }

  get initialManeuverAvoidanceRadius(): number {
    return this.config.avoidManeuverSeconds ?? this.initialSettings.initialManeuverAvoidanceRadius;
  }

  set initialManeuverAvoidanceRadius(seconds: number) {
    assertRadius(seconds);
    this.config.avoidManeuverSeconds = seconds;
  }

  get customRoutingProvider(): RoutingProvider | null {
    return this.controllerMode.kind === 'custom' ? this.controllerMode.provider : null;
  }

  /**
   * プロバイダーの有無に応じてエンジンに登録するコントローラーを切り替える
   */
  set customRoutingProvider(provider: RoutingProvider | null) {
    if (provider === this.customRoutingProvider) {
      return;
    }

    this.abortPendingRequest('routing provider replaced');
    this.controllerMode = provider ? { kind: 'custom', provider } : { kind: 'default' };
    this.navigator?.setRerouteController(provider ? this : this.defaultRerouteController);

    log.debug({ mode: this.controllerMode.kind }, 'Reroute controller mode changed');
  }

  get mode(): ControllerMode['kind'] {
    return this.controllerMode.kind;
  }

  get state(): RerouteState {
    return this.currentState;
  }

  /**
   * 組み込みの既定値に戻す（環境変数による起動時の設定は使わない）
   */
  resetToDefaultSettings(): void {
    this.reroutesProactively = REROUTE_DEFAULTS.REROUTES_PROACTIVELY;
    this.isCancelled = false;
    this.recentAcceptance = null;
    this.config.avoidManeuverSeconds = REROUTE_DEFAULTS.MANEUVER_AVOIDANCE_RADIUS;
    this.customRoutingProvider = null;
    this.currentState = 'idle';
  }

  // ============================================
  // Reporting
  // ============================================

  userIsOnRoute(): boolean {
    return !this.rerouteDetector.isReroute();
  }

  forceReroute(): void {
    this.rerouteDetector.forceReroute();
  }

  /**
   * エンジンから切り離し、標準コントローラーを戻す
   */
  dispose(): void {
    const navigator = this.navigator;
    if (!navigator) {
      return;
    }

    this.abortPendingRequest('coordinator disposed');
    this.removeObserver?.();
    this.removeObserver = null;
    navigator.setRerouteController(this.defaultRerouteController);
    this.navigator = null;
    this.delegate = null;
    this.currentState = 'idle';
  }

  // ============================================
  // RerouteObserver
  // ============================================

  onSwitchToAlternative(route: RouteHandle): void {
    // 代替ルート切り替えは現状の状態に影響させない
    log.debug({ routeId: route.routeId }, 'Switched to alternative route');
  }

  onRerouteDetected(routeRequest: string): void {
    this.isCancelled = false;
    this.recentAcceptance = null;

    if (!this.proactive) {
      this.currentState = 'idle';
      return;
    }

    log.debug({ requestLength: routeRequest.length }, 'Reroute detected');
    this.currentState = 'detecting';
    this.delegate?.didDetectReroute?.();
  }

  onRerouteReceived(routeResponse: string, routeRequest: string, origin: RouterOrigin): void {
    if (!this.proactive) {
      return;
    }

    const decodedRequest = decodeRequest(routeRequest);
    if (!decodedRequest.success) {
      this.notifyFailure(decodedRequest.error);
      return;
    }
    const { query, credentials } = decodedRequest.data;

    const recent = this.recentAcceptance;
    if (recent && recent.query.equalityKey === query.equalityKey) {
      log.debug({ origin, identifier: recent.identifier }, 'Delivering recently accepted route');
      this.currentState = 'succeeded';
      this.delegate?.didReceiveReroute(recent.result, recent.query);
      return;
    }

    const decodedResponse = decodeResponse(routeResponse, query, credentials);
    if (!decodedResponse.success) {
      this.notifyFailure(decodedResponse.error);
      return;
    }

    log.debug({ origin, routeCount: decodedResponse.data.routes.length }, 'Reroute received');
    this.currentState = 'succeeded';
    this.delegate?.didReceiveReroute(decodedResponse.data, query);
  }

  onRerouteCancelled(): void {
    this.recentAcceptance = null;
    if (!this.proactive) {
      return;
    }

    this.currentState = 'cancelled';
    this.delegate?.didCancelReroute();
  }

  onRerouteFailed(message: string, type: RerouteFailureType): void {
    this.recentAcceptance = null;
    if (!this.proactive) {
      return;
    }

    this.notifyFailure(RerouteError.fromFailureType(type, message));
  }

  // ============================================
  // RerouteControllerInterface
  // ============================================

  reroute(url: string, callback: RerouteCallback): void {
    if (!this.proactive || this.isCancelled) {
      this.rejectRequest(callback, 'cancelled', REROUTE_MESSAGES.CANCELLED);
      return;
    }

    if (this.controllerMode.kind !== 'custom') {
      this.rejectRequest(callback, 'no-provider', REROUTE_MESSAGES.NO_PROVIDER);
      return;
    }
    const { provider } = this.controllerMode;

    // 新しい要求は進行中の要求を置き換える
    this.abortPendingRequest('superseded by a new reroute request');

    const decoded = decodeRequest(url);
    if (!decoded.success) {
      this.recentAcceptance = null;
      log.warn({ details: decoded.error.details }, decoded.error.message);
      this.rejectRequest(callback, 'invalid-request', REROUTE_MESSAGES.UNDECODABLE_REQUEST);
      return;
    }
    const { query } = decoded.data;

    const recent = this.recentAcceptance;
    if (recent && recent.query.equalityKey === query.equalityKey) {
      log.debug({ identifier: recent.identifier }, 'Reusing recently accepted route');
      this.currentState = 'succeeded';
      callback({
        success: true,
        data: { routeResponse: recent.identifier, routeRequest: url, origin: 'custom' },
      });
      return;
    }

    const generation = ++this.generation;
    const controller = new AbortController();
    this.pendingRequest = { generation, controller, query };
    this.currentState = 'requesting';
    log.debug({ generation, profile: query.profile }, 'Requesting route from custom provider');

    let calculation: Promise<RouteResult>;
    try {
      calculation = provider.calculateRoutes(query, controller.signal);
    } catch (error) {
      this.handleProviderError(generation, error, callback);
      return;
    }

    void calculation.then(
      (result) => this.handleProviderResult(generation, url, query, result, callback),
      (error: unknown) => this.handleProviderError(generation, error, callback)
    );
  }

  cancel(): void {
    this.isCancelled = true;
    this.currentState = 'cancelled';
    this.recentAcceptance = null;
    this.defaultRerouteController.cancel();
    this.abortPendingRequest('cancelled');
  }

  // ============================================
  // Internal
  // ============================================

  private isCurrent(generation: number): boolean {
    return this.pendingRequest?.generation === generation;
  }

  private abortPendingRequest(reason: string): void {
    const pending = this.pendingRequest;
    if (!pending) {
      return;
    }

    this.pendingRequest = null;
    pending.controller.abort(RerouteError.cancelled(`Reroute request ${reason}`));
    log.debug({ generation: pending.generation, reason }, 'Pending reroute request aborted');
  }

  private handleProviderResult(
    generation: number,
    url: string,
    query: RouteQuery,
    result: RouteResult,
    callback: RerouteCallback
  ): void {
    if (!this.isCurrent(generation)) {
      log.debug({ generation }, 'Ignoring stale routing result');
      return;
    }
    this.pendingRequest = null;

    if (!result.identifier) {
      this.recentAcceptance = null;
      this.currentState = 'failed';
      callback({
        success: false,
        error: { message: REROUTE_MESSAGES.EMPTY_RESULT, type: 'empty-result' },
      });
      return;
    }

    this.recentAcceptance = { query, result, identifier: result.identifier };
    this.currentState = 'succeeded';
    log.debug({ generation, identifier: result.identifier }, 'Custom provider returned a route');
    callback({
      success: true,
      data: { routeResponse: result.identifier, routeRequest: url, origin: 'custom' },
    });
  }

  private handleProviderError(generation: number, error: unknown, callback: RerouteCallback): void {
    if (!this.isCurrent(generation)) {
      log.debug({ generation }, 'Ignoring stale routing failure');
      return;
    }
    this.pendingRequest = null;
    this.recentAcceptance = null;
    this.currentState = 'failed';

    const message = error instanceof Error ? error.message : String(error);
    log.warn({ generation, err: error }, 'Custom provider failed to calculate a route');
    callback({ success: false, error: { message, type: 'router-error' } });
  }

  private rejectRequest(callback: RerouteCallback, type: RerouteFailureType, message: string): void {
    this.currentState = 'idle';
    callback({ success: false, error: { message, type } });
  }

  private notifyFailure(error: RerouteError): void {
    this.currentState = 'failed';
    if (error.code === 'CANCELLED') {
      log.debug('Reroute cancelled');
    } else {
      log.warn({ code: error.code, details: error.details }, error.message);
    }
    this.delegate?.didFailToReroute(error);
  }
}
