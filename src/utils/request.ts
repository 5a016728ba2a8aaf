/**
 * HTTP GET with a timeout covering both headers and body
 */

import { HttpStatusError } from "./errors";
import type { HttpConfig } from "../types";

export type Fetcher = (url: string, init: RequestInit) => Promise<Response>;

export interface RequestOptions extends HttpConfig {
  fetch?: Fetcher;
}

/**
 * Fetch `url` and hand the successful response to `read`
 *
 * Non-2xx responses throw HttpStatusError; a timeout aborts the request
 * with an AbortError. No retries.
 */
export async function request<T>(
  url: string,
  options: RequestOptions,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const fetcher = options.fetch ?? fetch;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeout);

  try {
    const response = await fetcher(url, {
      signal: controller.signal,
      headers: { "User-Agent": options.userAgent },
    });

    if (!response.ok) {
      throw new HttpStatusError(response.status, response.statusText);
    }

    return await read(response);
  } finally {
    clearTimeout(timeoutId);
  }
}
