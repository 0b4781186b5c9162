export * from './analysis';
export * from './roi';
