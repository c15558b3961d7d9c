export { PlaylistManager, type PlaylistManagerDeps } from './PlaylistManager';
