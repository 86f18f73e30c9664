import { PreparationPipeline } from './preparationPipeline';
import { runStore, decisionBroker } from '../runs';

export * from './chartRenderer';
export * from './preparationPipeline';

export const preparationPipeline = new PreparationPipeline({
  store: runStore,
  broker: decisionBroker,
});
