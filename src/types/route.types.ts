/**
 * ルートクエリ・ルート結果 型定義
 */

export interface Coordinates {
  lat: number;
  lng: number;
}

export type Approach = 'unrestricted' | 'curb';

export interface Bearing {
  angle: number;
  tolerance: number;
}

export interface RouteWaypoint {
  readonly coordinate: Coordinates;
  readonly name?: string;
  readonly bearing?: Bearing;
  readonly radius?: number | 'unlimited';
  readonly approach?: Approach;
}

/**
 * 構造化されたリルート要求
 *
 * equalityKey はルート計算に影響する全フィールドの正規化表現で、
 * 認証情報などの一時的なパラメータは含まない。
 */
export interface RouteQuery {
  readonly profile: string;
  readonly waypoints: readonly RouteWaypoint[];
  readonly waypointIndices?: readonly number[];
  readonly alternatives?: boolean;
  readonly steps?: boolean;
  readonly continueStraight?: boolean;
  readonly voiceInstructions?: boolean;
  readonly bannerInstructions?: boolean;
  readonly language?: string;
  readonly geometries?: string;
  readonly overview?: string;
  readonly exclude: readonly string[];
  readonly annotations: readonly string[];
  readonly avoidManeuverRadius?: number;
  readonly additionalParameters: Readonly<Record<string, string>>;
  readonly equalityKey: string;
}

export interface Credentials {
  readonly accessToken: string | null;
  readonly host: string;
}

export interface LineStringGeometry {
  type: 'LineString';
  coordinates: Array<[number, number]>;
}

export interface RouteLeg {
  readonly summary: string;
  readonly distance: number;
  readonly duration: number;
}

export interface Route {
  readonly distance: number;
  readonly duration: number;
  readonly weight?: number;
  readonly weightName?: string;
  readonly geometry?: string | LineStringGeometry;
  readonly legs: readonly RouteLeg[];
}

export interface ResultWaypoint {
  readonly name: string;
  readonly coordinate: Coordinates;
}

export interface RouteResult {
  readonly identifier: string | null;
  readonly routes: readonly Route[];
  readonly waypoints: readonly ResultWaypoint[];
  readonly query: RouteQuery;
  readonly credentials: Credentials;
}

/**
 * デコード結果（失敗は例外ではなく値として返す）
 */
export type DecodeResult<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };
