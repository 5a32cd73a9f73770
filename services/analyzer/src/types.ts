import type { AnalyzerConfig } from './config';
import type { AnalyzerMetrics } from './metrics';
import type { WizardSessionStore } from './session/store';
import type { ViewRenderer } from './views';

export interface ReadinessState {
  uploads: boolean;
}

export interface AppContext {
  config: AnalyzerConfig;
  sessions: WizardSessionStore;
  metrics: AnalyzerMetrics;
  views: ViewRenderer;
  readiness: ReadinessState;
}
