/**
 * Shared layer - re-exports all shared utilities
 */

// Library utilities
export * from './lib';
