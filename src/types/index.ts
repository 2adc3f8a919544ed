export type * from './nodes';
export type * from './results';
