// Record model and field taxonomy
export * from './fields.js';

// Error classes
export * from './errors.js';

// Zod schemas
export * from './schemas/index.js';

// Output validation (AJV)
export * from './validation/index.js';

// Pure utils (date, money, logging, constants)
export * from './utils/index.js';
