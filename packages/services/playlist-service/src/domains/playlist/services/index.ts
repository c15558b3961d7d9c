export * from './InsertionPipeline';
export * from './DynamicPlaylistController';
