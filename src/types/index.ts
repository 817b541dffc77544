export type * from './log-event.js';
export type * from './rule-match.js';
export type * from './mitre-attack.js';
export type * from './timeline.js';
export type * from './ioc.js';
export type * from './analysis.js';
export type * from './collaborators.js';
export type * from './config.js';
