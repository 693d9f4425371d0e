export * from './time.utils';
