export * from './task.types';
export * from './result.types';
export * from './ports.types';
