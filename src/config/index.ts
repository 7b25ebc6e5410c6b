/**
 * Config Exports
 */

export * from './service-config';
export * from './profile-store';
