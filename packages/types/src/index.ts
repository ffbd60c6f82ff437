/**
 * @reliquary/types - Type definitions for the Reliquary resource registry
 */

// Property types
export * from './properties.js';

// Resource, type tag and registry contracts
export * from './resources.js';
