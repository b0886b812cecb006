/**
 * Native barrel export: host-facing contracts and in-process stand-ins.
 */

export {
  type Bounds,
  type FontMetrics,
  type FixedAdvanceOptions,
  FixedAdvanceMetrics,
} from './font-metrics';
