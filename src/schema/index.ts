// src/schema/index.ts

export * from './config';
export type * from './replica';
