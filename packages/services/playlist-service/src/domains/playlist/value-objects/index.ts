export * from './TrackEntry';
export * from './ItemRef';
