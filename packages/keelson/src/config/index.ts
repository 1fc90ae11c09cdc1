export * from './ast';
export * from './decode';
export * from './duration';
export * from './expressions';
export * from './schema';
export * from './source';
