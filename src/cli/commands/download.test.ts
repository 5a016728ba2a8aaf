import {
  describe,
  it,
  expect,
  vi,
  beforeEach,
  afterEach,
  type MockInstance,
} from "vitest";
import { mkdtemp, readdir, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { runDownload, type DownloadDependencies } from "./download";
import { DownloadFailureError, HttpStatusError } from "../../utils/errors";
import type { Album, AlbumPage, AlbumService } from "../../types";

const ALBUM_URL = "https://bibliotheque-numerique.inha.fr/viewer/42";

class FakeAlbumService implements AlbumService {
  readonly albumsRequested: string[] = [];
  readonly fetched: number[] = [];

  constructor(
    private readonly pageCount: number,
    private readonly failing: ReadonlySet<number> = new Set(),
  ) {}

  async getAlbum(ref: { id: string; url: string }): Promise<Album> {
    this.albumsRequested.push(ref.id);
    return {
      id: ref.id,
      url: ref.url,
      title: "Carnet",
      pageCount: this.pageCount,
      pages: Array.from({ length: this.pageCount }, (_, i) => ({
        index: i + 1,
        name: `C42_${i + 1}`,
        url: `https://library.example.test/i/${i + 1}.jpg`,
      })),
    };
  }

  async fetchPage(page: AlbumPage): Promise<Uint8Array> {
    this.fetched.push(page.index);
    if (this.failing.has(page.index)) {
      throw new DownloadFailureError(page.index, page.url, {
        cause: new HttpStatusError(500, "Internal Server Error"),
      });
    }
    return new TextEncoder().encode(`image-${page.index}`);
  }
}

function dependencies(service: AlbumService): DownloadDependencies {
  return { createService: () => service };
}

describe("runDownload", () => {
  let dir: string;
  let errorLog: MockInstance<typeof console.error>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "inha-command-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    errorLog = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  // ==========================================================================
  // Argument errors
  // ==========================================================================
  describe("argument errors", () => {
    it("rejects a malformed range before contacting the service", async () => {
      const service = new FakeAlbumService(5);

      const code = await runDownload(
        ALBUM_URL,
        { images: "3-1", outputDir: join(dir, "album") },
        dependencies(service),
      );

      expect(code).toBe(1);
      expect(service.albumsRequested).toEqual([]);
      expect(service.fetched).toEqual([]);
      expect(await readdir(dir)).toEqual([]);
      expect(errorLog).toHaveBeenCalledWith(
        '[ERROR] Invalid range "3-1": 3 must not be greater than 1',
      );
    });

    it("rejects a non-integer range before contacting the service", async () => {
      const service = new FakeAlbumService(5);

      const code = await runDownload(
        ALBUM_URL,
        { images: "a-5", outputDir: join(dir, "album") },
        dependencies(service),
      );

      expect(code).toBe(1);
      expect(service.albumsRequested).toEqual([]);
    });

    it("rejects an invalid album URL before contacting the service", async () => {
      const service = new FakeAlbumService(5);

      const code = await runDownload(
        "https://bibliotheque-numerique.inha.fr/collection/42",
        { outputDir: join(dir, "album") },
        dependencies(service),
      );

      expect(code).toBe(1);
      expect(service.albumsRequested).toEqual([]);
      expect(await readdir(dir)).toEqual([]);
    });

    it("rejects pages past the end of the album before downloading", async () => {
      const service = new FakeAlbumService(3);

      const code = await runDownload(
        ALBUM_URL,
        { images: "1-20000000", outputDir: join(dir, "album") },
        dependencies(service),
      );

      expect(code).toBe(1);
      expect(service.albumsRequested).toEqual(["42"]);
      expect(service.fetched).toEqual([]);
      expect(errorLog).toHaveBeenCalledWith(
        "[ERROR] Asked for page 4 but the album only has 3 pages",
      );
    });
  });

  // ==========================================================================
  // Downloads
  // ==========================================================================
  describe("downloads", () => {
    it("exits 0 after saving the selected pages", async () => {
      const service = new FakeAlbumService(3);
      const target = join(dir, "album");

      const code = await runDownload(
        ALBUM_URL,
        { images: "1,3", outputDir: target },
        dependencies(service),
      );

      expect(code).toBe(0);
      expect((await readdir(target)).sort()).toEqual([
        "000001.jpg",
        "000003.jpg",
      ]);
      expect(await readFile(join(target, "000001.jpg"), "utf-8")).toBe(
        "image-1",
      );
    });

    it("exits 1 and stops when a page fails", async () => {
      const service = new FakeAlbumService(3, new Set([2]));
      const target = join(dir, "album");

      const code = await runDownload(
        ALBUM_URL,
        { outputDir: target },
        dependencies(service),
      );

      expect(code).toBe(1);
      expect(service.fetched).toEqual([1, 2]);
      expect(await readdir(target)).toEqual(["000001.jpg"]);
      expect(errorLog).toHaveBeenCalledWith(
        "[ERROR] Page 2 failed to download: HTTP 500: Internal Server Error",
      );
    });
  });
});
