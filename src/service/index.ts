/**
 * Album service exports
 */

export { HttpAlbumService, buildImageUrl } from "./http-album-service";
export { parseAlbumPage, AlbumPageParseError } from "./album-page";
export type { AlbumPageData } from "./album-page";
export { parseAlbumUrl } from "./parse-album-url";
