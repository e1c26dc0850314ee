import { DEVIATION, HOURS, LATENCY } from '../constants.js';
import type { SignalSpec } from '../types/index.js';

/**
 * Reference signal table. Order is significant: sub-scores and rejection
 * reasons are reported in this order.
 *
 *   signal            weight  kind
 *   typing_speed        15    deviation
 *   key_hold_time       15    deviation
 *   mouse_velocity      10    deviation
 *   click_interval      10    deviation
 *   scroll_depth        10    deviation
 *   network_latency     10    hard_cap
 *   device_hash         15    binary_match
 *   location_hash       10    binary_match
 *   time_of_day          5    circular_proximity
 */
export const DEFAULT_SIGNALS: readonly SignalSpec[] = Object.freeze<SignalSpec[]>([
  { signal: 'typing_speed',    kind: 'deviation',          weight: 15, maxDeviation: DEVIATION.MAX_DEVIATION },
  { signal: 'key_hold_time',   kind: 'deviation',          weight: 15, maxDeviation: DEVIATION.MAX_DEVIATION },
  { signal: 'mouse_velocity',  kind: 'deviation',          weight: 10, maxDeviation: DEVIATION.MAX_DEVIATION },
  { signal: 'click_interval',  kind: 'deviation',          weight: 10, maxDeviation: DEVIATION.MAX_DEVIATION },
  { signal: 'scroll_depth',    kind: 'deviation',          weight: 10, maxDeviation: DEVIATION.MAX_DEVIATION },
  { signal: 'network_latency', kind: 'hard_cap',           weight: 10, cap: LATENCY.CAP_MS },
  { signal: 'device_hash',     kind: 'binary_match',       weight: 15 },
  { signal: 'location_hash',   kind: 'binary_match',       weight: 10 },
  { signal: 'time_of_day',     kind: 'circular_proximity', weight: 5,  period: HOURS.PERIOD },
]);

/** Sum of weights in a signal table. */
export function totalWeight(signals: readonly SignalSpec[]): number {
  return signals.reduce((sum, spec) => sum + spec.weight, 0);
}
