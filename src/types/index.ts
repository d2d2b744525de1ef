// Action metadata types
export * from './metadata.types';

// Common types
export * from './common.types';

// Commit analyzer types
export * from './commit-analyzer.types';

// Configuration types
export * from './config.types';

// Context and runtime types
export * from './context.types';

// GitHub related types
export * from './github.types';

// Commit message machine types
export * from './machine.types';
