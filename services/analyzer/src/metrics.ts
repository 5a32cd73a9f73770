import { Counter, Gauge, Registry } from 'prom-client';

export interface AnalyzerMetrics {
  register: Registry;
  uploads: Counter<'outcome'>;
  analyses: Counter<'outcome' | 'source'>;
  sessionsDiscarded: Counter<'reason'>;
  activeSessions: Gauge;
  readinessGauge: Gauge<'component'>;
}

export const createMetrics = (): AnalyzerMetrics => {
  const register = new Registry();

  const uploads = new Counter({
    name: 'station_analyzer_uploads_total',
    help: 'Wizard uploads by outcome',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const analyses = new Counter({
    name: 'station_analyzer_analyses_total',
    help: 'Analysis workbooks requested, by outcome and entry point',
    registers: [register],
    labelNames: ['outcome', 'source'] as const
  });

  const sessionsDiscarded = new Counter({
    name: 'station_analyzer_sessions_discarded_total',
    help: 'Wizard sessions whose temporary upload was removed',
    registers: [register],
    labelNames: ['reason'] as const
  });

  const activeSessions = new Gauge({
    name: 'station_analyzer_active_sessions',
    help: 'Wizard sessions holding a temporary upload',
    registers: [register]
  });

  const readinessGauge = new Gauge({
    name: 'station_analyzer_component_ready',
    help: 'Readiness state per component (1 ready, 0 not ready)',
    registers: [register],
    labelNames: ['component'] as const
  });

  return {
    register,
    uploads,
    analyses,
    sessionsDiscarded,
    activeSessions,
    readinessGauge
  };
};
