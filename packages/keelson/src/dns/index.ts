export * from './entries';
export * from './verify';
