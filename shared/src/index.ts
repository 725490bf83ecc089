export type * from './dispatch.js';
