import { InvalidAlbumUrlError } from "../utils/errors";
import type { AlbumReference } from "../types";

const VIEWER_PATH = /\/viewer\/(\d+)(?:\/|$)/;

/**
 * Extract the album id from a viewer URL such as
 * https://bibliotheque-numerique.inha.fr/viewer/12345, or accept a bare id
 */
export function parseAlbumUrl(input: string, baseUrl: string): AlbumReference {
  const trimmed = input.trim();
  let id: string | undefined;

  if (/^\d+$/.test(trimmed)) {
    id = trimmed;
  } else if (URL.canParse(trimmed)) {
    id = VIEWER_PATH.exec(new URL(trimmed).pathname)?.[1];
  }

  if (!id) {
    throw new InvalidAlbumUrlError(input);
  }

  return {
    id,
    url: `${baseUrl.replace(/\/+$/, "")}/viewer/${id}`,
  };
}
