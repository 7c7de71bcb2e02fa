export * from './errors';
export * from './types';
export * from './stateStore';
export * from './transitionEngine';
export * from './eventSynchronizer';
export { withTimeout } from './timeout';
