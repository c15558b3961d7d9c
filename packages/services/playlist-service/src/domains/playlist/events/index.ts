export * from './PlaylistNotifier';
