export { createMockCoreApp, startMockCore } from './mockCore';
export type { RunningMockCore } from './mockCore';
export { addNode, createDemoState, createState } from './state';
export type { MockCoreState, MockDelay, MockProxy } from './state';
