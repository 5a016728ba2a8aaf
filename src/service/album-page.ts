/**
 * Album viewer page parsing
 * The viewer embeds the image list and the IIIF media path in inline scripts
 */

import { load } from "cheerio";
import { z } from "zod";

export interface AlbumPageData {
  title: string;
  media: string;
  images: string[];
}

const PATTERNS = {
  images: /var\s+images\s*=\s*(\[[^\]]*\])\s*;/,
  media: /['"]server['"]\s*:\s*['"]\/medias([a-f0-9/-]+)['"]/,
};

const ImageListSchema = z.array(z.string().min(1)).nonempty();

/**
 * Thrown when the viewer page lacks an expected piece
 * Usually a wrong URL, or the site changed its markup
 */
export class AlbumPageParseError extends Error {
  constructor(readonly field: string) {
    super(`${field} not found in album page`);
    this.name = "AlbumPageParseError";
  }
}

function parseStringList(literal: string): string[] {
  const items: string[] = [];
  for (const match of literal.matchAll(/(['"])(.*?)\1/g)) {
    items.push(match[2]);
  }
  return items;
}

export function parseAlbumPage(html: string): AlbumPageData {
  const $ = load(html);

  const title = $("title").first().text().replace(/\s+/g, " ").trim();
  const scripts = $("script:not([src])")
    .toArray()
    .map((el) => $(el).text())
    .join("\n");

  const imagesMatch = PATTERNS.images.exec(scripts);
  if (!imagesMatch) {
    throw new AlbumPageParseError("image list");
  }
  const images = ImageListSchema.safeParse(parseStringList(imagesMatch[1]));
  if (!images.success) {
    throw new AlbumPageParseError("image list");
  }

  const mediaMatch = PATTERNS.media.exec(scripts);
  if (!mediaMatch) {
    throw new AlbumPageParseError("media server");
  }

  return { title, media: mediaMatch[1], images: images.data };
}
