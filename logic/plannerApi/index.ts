/**
 * Battery Planner API Module
 * Exports all planner API functionality
 */

export * from './types';
export * from './errors';
export * from './schemas';
export * from './apiClient';
export * from './credentialStore';
export * from './planService';
