/**
 * Progress events emitted by the download loop
 */

export type PageStatus = "downloaded" | "skipped" | "planned";

export interface PageProgress {
  page: number;
  // Pages processed so far, including this one
  position: number;
  total: number;
  path: string;
  url: string;
  bytes: number;
  status: PageStatus;
}

export interface ProgressReporter {
  onPage(event: PageProgress): void;
}
