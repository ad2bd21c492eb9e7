/**
 * @ipam-report/shared
 *
 * Shared utilities, schemas and constants
 */

// Schemas
export * from './schemas/usage-report.schema';

// Utils
export * from './utils/cidr.util';
export * from './utils/reuse-window.util';
