export * from './health-routes';
export * from './playlist-routes';
