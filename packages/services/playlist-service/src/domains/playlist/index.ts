/**
 * Playlist Domain
 * Item store, play order, undo, insertion and dynamic playlists
 */

export * from './value-objects';
export * from './entities';
export * from './events';
export * from './services';
export type * from './ports';
export { MutationLog, type MutationCommand } from './undo';
