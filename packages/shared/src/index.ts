export * from './geo/types';
export * from './geo/math';
export * from './geo/polygon';
export * from './geo/address';
export * from './geo/streets';
export * from './landmarks/types';
export * from './landmarks/catalog';
export * from './presentation/effects';
export * from './config/cities';
