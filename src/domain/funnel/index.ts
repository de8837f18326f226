export { analyzeFunnel, transitionInto } from './FunnelAnalyzer';
export type { FunnelTransition } from './FunnelAnalyzer';
