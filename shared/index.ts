export * from './autofill/fieldTypes';
export * from './autofill/types';
export * from './autofill/formStructure';
export * from './autofill/heuristics';
export * from './autofill/records';
export * from './autofill/guidIds';
export * from './autofill/sections';
export * from './autofill/labels';
export * from './autofill/suggestions';
export * from './autofill/select';
export * from './autofill/fill';
export * from './autofill/metrics';
export * from './autofill/submission';
export * from './autofill/recentSignatures';
export * from './autofill/scheduler';
export * from './autofill/manager';
export * from './errors';
export * from './validate';
export * from './schema/queryResponse';
export * from './storage/settings';
export * from './storage/personalData';
export type * from './types';
