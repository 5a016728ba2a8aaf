/**
 * Album data shared between the album service and the pipeline
 */

export interface AlbumReference {
  id: string;
  // Canonical viewer URL for the album
  url: string;
}

export interface AlbumPage {
  index: number; // 1-based
  name: string;
  url: string;
}

export interface Album {
  id: string;
  url: string;
  title: string;
  pageCount: number;
  pages: readonly AlbumPage[];
}

/**
 * Remote album service boundary
 * Everything specific to the hosting site stays behind this interface
 */
export interface AlbumService {
  getAlbum(ref: AlbumReference): Promise<Album>;
  fetchPage(page: AlbumPage): Promise<Uint8Array>;
}
