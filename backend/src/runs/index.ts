import { RunStore } from './runStore';
import { DecisionBroker } from './decisionBroker';

export * from './types';
export * from './configAssembler';
export * from './runStore';
export * from './decisionBroker';

// Singleton instances
export const runStore = new RunStore();
export const decisionBroker = new DecisionBroker();
