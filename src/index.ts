// Main entry point for the config-coordination library

// Common
export * from './common/Clock';
export * from './common/errors';
export * from './common/json';
export * from './common/logger';
export * from './common/utils';

// Service registry
export * from './registry/types';
export * from './registry/ServiceRecordStore';
export * from './registry/LivenessEvaluator';
export * from './registry/QueryEngine';
export * from './registry/ServiceRegistry';

// Configuration
export * from './config/FileConfigStore';
export * from './config/CoordinationSettings';
export * from './config/ConfigHistory';
export * from './config/ConfigSchema';
export * from './config/transforms';

// Coordination facade
export * from './coordination/ConfigSubscriptions';
export * from './coordination/CoordinationService';
