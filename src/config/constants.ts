/**
 * Reroute Constants
 */

// ============================================
// Reroute Defaults
// ============================================

export const REROUTE_DEFAULTS = {
  MANEUVER_AVOIDANCE_RADIUS: 8.0, // seconds
  REROUTES_PROACTIVELY: true,
} as const;

// ============================================
// Directions Request Format
// ============================================

export const DIRECTIONS_CONSTANTS = {
  API_VERSION_PATH: 'directions/v5',
  LIST_SEPARATOR: ';',
  VALUE_SEPARATOR: ',',
} as const;

// 認証・計測用でルート計算に影響しないパラメータ
export const TRANSIENT_QUERY_PARAMETERS: readonly string[] = [
  'access_token',
  'sku',
  'request_timestamp',
];

// ============================================
// Reroute Failure Messages
// ============================================

export const REROUTE_MESSAGES = {
  CANCELLED: 'Cancelled by user.',
  NO_PROVIDER: 'Custom rerouting triggered with no proper rerouting provider.',
  UNDECODABLE_REQUEST: 'Unable to decode route request for rerouting.',
  EMPTY_RESULT: 'Failed to process route response.',
} as const;
