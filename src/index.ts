/**
 * aws-domain-roles - per-domain AWS credential resolution
 *
 * Main library exports
 */

// Export types
export * from './types/config.js';
export * from './types/aws.js';

// Export core functionality
export * from './core/config/index.js';
export * from './core/aws/index.js';
