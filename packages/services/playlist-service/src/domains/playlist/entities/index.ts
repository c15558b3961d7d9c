export { ItemStore, type StoredItem, type InsertedRange } from './ItemStore';
export * from './PlaybackOrder';
export * from './PlaybackQueue';
export * from './Playlist';
