// Factories
export * from './factories/invocation.factory';
export * from './factories/env.factory';

// Fixtures
export * from './fixtures/wav.builder';

// Fakes
export * from './fakes/in-memory-queue';
export * from './fakes/in-memory-object-store';
export * from './fakes/recording-notifier';

// Helpers
export * from './helpers/wait.helper';
