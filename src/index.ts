export * from './domain/models';
export * from './domain/errors';
export * from './domain/repository';
export * from './domain/configuration_validator';
export * from './domain/device_identity';
export * from './infrastructure/configuration_store';
export * from './infrastructure/activation_ledger';
export * from './infrastructure/in_memory_repository';
export * from './api/session_client';
export * from './workflow/activation_steps';
export * from './workflow/activation_workflow';
export * from './application/activation_service';
export * from './config/settings';
export * from './logger';
