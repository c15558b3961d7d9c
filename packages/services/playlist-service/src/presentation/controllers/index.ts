export { PlaylistController, toEntryView, toPlaylistView, type EntryView } from './PlaylistController';
