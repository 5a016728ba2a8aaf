/**
 * Album service backed by the INHA viewer over HTTP
 */

import { fillTemplate } from "../utils/fill-template";
import {
  request,
  type Fetcher,
  type RequestOptions,
} from "../utils/request";
import { DownloadFailureError, RemoteServiceError } from "../utils/errors";
import { parseAlbumPage, type AlbumPageData } from "./album-page";
import type {
  Album,
  AlbumPage,
  AlbumReference,
  AlbumService,
  HttpConfig,
  ImageUrlPlaceholder,
  ServiceConfig,
} from "../types";

/**
 * Image URL for one page of an album
 */
export function buildImageUrl(
  template: string,
  album: { id: string; media: string },
  index: number,
  image: string,
): string {
  const values: Record<ImageUrlPlaceholder, string | number> = {
    media: album.media,
    image,
    album: album.id,
    index,
  };
  return fillTemplate(template, values);
}

export class HttpAlbumService implements AlbumService {
  constructor(
    private readonly service: ServiceConfig,
    private readonly http: HttpConfig,
    private readonly fetcher?: Fetcher,
  ) {}

  async getAlbum(ref: AlbumReference): Promise<Album> {
    let html: string;
    try {
      html = await request(ref.url, this.requestOptions(), (res) =>
        res.text(),
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RemoteServiceError(ref.url, reason, { cause: error });
    }

    let data: AlbumPageData;
    try {
      data = parseAlbumPage(html);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RemoteServiceError(ref.url, reason, { cause: error });
    }

    const pages: AlbumPage[] = data.images.map((image, i) => ({
      index: i + 1,
      name: image,
      url: buildImageUrl(
        this.service.imageUrlTemplate,
        { id: ref.id, media: data.media },
        i + 1,
        image,
      ),
    }));

    return {
      id: ref.id,
      url: ref.url,
      title: data.title,
      pageCount: pages.length,
      pages,
    };
  }

  async fetchPage(page: AlbumPage): Promise<Uint8Array> {
    try {
      return await request(
        page.url,
        this.requestOptions(),
        async (res) => new Uint8Array(await res.arrayBuffer()),
      );
    } catch (error) {
      throw new DownloadFailureError(page.index, page.url, { cause: error });
    }
  }

  private requestOptions(): RequestOptions {
    return { ...this.http, fetch: this.fetcher };
  }
}
