export * from './outputs';
