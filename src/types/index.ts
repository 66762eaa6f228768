// Action metadata types
export type * from './metadata.types';

// Configuration types
export type * from './config.types';

// Context and runtime types
export type * from './context.types';

// GitHub related types
export type * from './github.types';

// Release note related types
export type * from './release-notes.types';
