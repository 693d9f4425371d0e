export * from './base.error';
export * from './task-validation.error';
export * from './audio-decode.error';
export * from './storage.error';
export * from './webhook.error';
export * from './queue.error';
export * from './configuration.error';
