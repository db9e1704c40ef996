export * from './ErrorContext';
export * from './RegistryError';
export * from './errors';
export * from './errorFactory';
