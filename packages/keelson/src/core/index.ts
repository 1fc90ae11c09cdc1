export * from './component';
export * from './diagnostics';
export * from './errors';
export * from './registry';
