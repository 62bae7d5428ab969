export * from './lib/shared-types';
