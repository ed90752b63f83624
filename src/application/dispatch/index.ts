/**
 * @lumberline/core - Dispatch Module
 */

export {
  isSubscriberStage,
  filterStage,
  enrichStage,
  formatStage,
  exportStage,
} from './ISubscriberStage';
export type {
  ISubscriberStage,
  IFilterCapability,
  IEnrichCapability,
  IFormatCapability,
  IExportCapability,
  RenderedRecord,
  StageCapability,
} from './ISubscriberStage';

export { SubscriberChain } from './SubscriberChain';
export type { SubscriberChainOptions } from './SubscriberChain';

export {
  SubscriberChainBuilder,
  createSubscriberChain,
} from './SubscriberChainBuilder';

export { levelFilter, targetFilter, staticFieldsEnricher } from './stages';
export type { LevelThreshold } from './stages';
