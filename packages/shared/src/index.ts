// Main entry point for @rooftop/shared

// Export all types
export * from './types';

// Export config
export * from './config';

// Export utilities
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/random';

// Export simulated analysis and strategies
export * from './analysis/simulator';
export * from './analysis/strategy';

// Export ROI calculator
export * from './roi/calculator';

// Export report formatting
export * from './report/format';

// Export HTTP middleware
export * from './http/security-middleware';
