export { UrlTrackResolver } from './UrlTrackResolver';
