import { describe, it, expect, vi } from "vitest";
import { HttpAlbumService, buildImageUrl } from "./http-album-service";
import {
  DownloadFailureError,
  HttpStatusError,
  RemoteServiceError,
} from "../utils/errors";
import type { Fetcher } from "../utils/request";
import type { ServiceConfig } from "../types";

const service: ServiceConfig = {
  baseUrl: "https://library.example.test",
  imageUrlTemplate:
    "https://library.example.test/i/?IIIF={media}/iiif/{image}.tif/full/full/0/native.jpg",
};
const http = { timeout: 1000, userAgent: "test-agent" };
const ref = { id: "42", url: "https://library.example.test/viewer/42" };

const VIEWER_HTML = `<html><head><title>Carnet</title></head><body>
<script>
  var images = ['C42_000001', 'C42_000002'];
  var v = { 'server': '/medias/aa/bb-cc' };
</script>
</body></html>`;

describe("buildImageUrl", () => {
  it("fills the image template", () => {
    expect(
      buildImageUrl(
        service.imageUrlTemplate,
        { id: "42", media: "/aa/bb-cc" },
        1,
        "C42_000001",
      ),
    ).toBe(
      "https://library.example.test/i/?IIIF=/aa/bb-cc/iiif/C42_000001.tif/full/full/0/native.jpg",
    );
  });
});

describe("HttpAlbumService", () => {
  describe("getAlbum", () => {
    it("builds the album from the viewer page", async () => {
      const fetcher = vi.fn<Fetcher>(async () => new Response(VIEWER_HTML));
      const albums = new HttpAlbumService(service, http, fetcher);

      const album = await albums.getAlbum(ref);

      expect(fetcher.mock.calls[0][0]).toBe(ref.url);
      expect(album.id).toBe("42");
      expect(album.title).toBe("Carnet");
      expect(album.pageCount).toBe(2);
      expect(album.pages[1]).toEqual({
        index: 2,
        name: "C42_000002",
        url: "https://library.example.test/i/?IIIF=/aa/bb-cc/iiif/C42_000002.tif/full/full/0/native.jpg",
      });
    });

    it("wraps HTTP failures", async () => {
      const fetcher: Fetcher = async () =>
        new Response("", { status: 503, statusText: "Service Unavailable" });
      const albums = new HttpAlbumService(service, http, fetcher);

      await expect(albums.getAlbum(ref)).rejects.toThrow(
        new RemoteServiceError(ref.url, "HTTP 503: Service Unavailable"),
      );
    });

    it("wraps unparsable pages", async () => {
      const fetcher: Fetcher = async () =>
        new Response("<html><title>Not found</title></html>");
      const albums = new HttpAlbumService(service, http, fetcher);

      await expect(albums.getAlbum(ref)).rejects.toBeInstanceOf(
        RemoteServiceError,
      );
    });
  });

  describe("fetchPage", () => {
    const page = {
      index: 3,
      name: "C42_000003",
      url: "https://library.example.test/i/3.jpg",
    };

    it("returns the response bytes", async () => {
      const fetcher: Fetcher = async () =>
        new Response(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]));
      const albums = new HttpAlbumService(service, http, fetcher);

      const bytes = await albums.fetchPage(page);

      expect(Array.from(bytes)).toEqual([0xff, 0xd8, 0xff, 0xe0]);
    });

    it("reports the failing page", async () => {
      const fetcher: Fetcher = async () =>
        new Response("", { status: 404, statusText: "Not Found" });
      const albums = new HttpAlbumService(service, http, fetcher);

      const error = await albums.fetchPage(page).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadFailureError);
      expect(error).toMatchObject({
        page: 3,
        url: page.url,
        message: "Page 3 failed to download: HTTP 404: Not Found",
      });
      expect(error).toHaveProperty(
        "cause",
        new HttpStatusError(404, "Not Found"),
      );
    });
  });
});
