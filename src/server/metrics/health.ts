import type { SessionMetrics } from '../types.js';
import { Counters } from './counters.js';

export function buildSessionHealthSummary(metrics: SessionMetrics, counters: Counters) {
  return {
    metrics,
    navigationsTotal: counters.navigationsTotal,
    navigationFailuresTotal: counters.navigationFailuresTotal,
    historyMissTotal: counters.historyMissTotal,
    reflowByOutcome: counters.reflowTotal
  };
}
