export * from './DatabaseConnectionFactory';
export { DrizzlePlaylistBackend } from './DrizzlePlaylistBackend';
export { DrizzleLibraryProvider, toTrackEntry } from './DrizzleLibraryProvider';
export { InMemoryPlaylistBackend } from './InMemoryPlaylistBackend';
