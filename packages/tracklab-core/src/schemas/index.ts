// Re-export all schemas and types
export * from './task.schema';
export * from './message.schema';
export * from './waveform.schema';
export * from './webhook.schema';
