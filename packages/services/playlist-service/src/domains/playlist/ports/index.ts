export type * from './IPlaylistBackend';
export type * from './ILibraryProvider';
export type * from './IPlaybackQueue';
export type * from './TrackGenerator';
export type * from './SongInsertVetoListener';
export type * from './IUrlResolver';
export type * from './DisplayFilter';
