// Configuration
export * from './attendance-config.schema.js';

// Report tables
export * from './attendance-reports.schema.js';
