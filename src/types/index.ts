export type * from './dom.js';
export type * from './raw-snapshot.js';
export type * from './action-result.js';
export type * from './agent.js';
export type * from './message.js';
export type * from './run.js';
