/**
 * Pipeline modules export
 */

export { resolve } from "./resolver";
export { select } from "./selector";
export { download } from "./downloader";
export { stats } from "./stats";
