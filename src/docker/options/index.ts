export * from './common';
export * from './container';
export * from './image';
export * from './network';
export * from './service';
export * from './system';
export * from './volume';
