export * from './devices';
export * from './packet';
