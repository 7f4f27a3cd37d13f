export type * from './values';
export type * from './descriptor';
export type * from './schema';
export type * from './merge';
