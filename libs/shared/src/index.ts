// Types
export * from './types/json.types';

// Utilities
export * from './utils/date.utils';
export * from './utils/error.utils';
export * from './utils/uuid.utils';
export * from './utils/validation.utils';
