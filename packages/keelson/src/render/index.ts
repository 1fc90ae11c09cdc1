export * from './assets';
export * from './charts';
export * from './manifests';
export * from './scheduling';
export * from './values';
