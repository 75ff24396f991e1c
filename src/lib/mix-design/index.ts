export * from './constants';
export * from './empirical';
export * from './errors';
export * from './format';
export * from './optimizer';
export * from './random';
export * from './schemas';
export * from './volumetric';
