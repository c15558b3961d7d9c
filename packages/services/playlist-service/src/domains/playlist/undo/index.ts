export * from './commands';
export * from './MutationLog';
