export * from './errors/AppError';
export * from './errors/ErrorHandler';
export * from './logging/Logger';
