export { PlaylistError, PlaylistErrorCode, type PlaylistErrorCodeType } from './errors';
