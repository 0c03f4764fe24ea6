export {
  createDebounce,
  newDebounce,
  newGroupedDebounce,
  newLastDebounce,
  newCountedDebounce
} from './debounce.js';
export type { DebounceOptions, DebounceStage } from './debounce.js';
export {
  DEBOUNCE_EVENT,
  SignalAccumulator,
  GroupedAccumulator,
  LastAccumulator,
  CountedAccumulator
} from './accumulators.js';
export type { Accumulator, DebounceEvent } from './accumulators.js';
