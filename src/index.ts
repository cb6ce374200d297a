export * from './lib/errors';
export * from './lib/types';
export { FetchLike, DEFAULT_TIMEOUT_MS, fetchWithTimeout } from './lib/http';
export { TokenProvider, TokenProviderOptions, SPOTIFY_TOKEN_URL, EXPIRY_MARGIN_SECONDS } from './lib/tokenProvider';
export { CatalogClient, CatalogClientOptions, TokenSource, SPOTIFY_SEARCH_URL, searchUrlFor } from './lib/catalogClient';
export { SearchTrack, decodeSearchResponse, releaseYearOf } from './lib/searchResponse';
export { BatchOptions, BatchProgress, DEFAULT_DELAY_MS, processIsrcList } from './lib/batchProcessor';
export * from './lib/report';
export { ExportFormat, exportResults, writeCsv, writeJson, writeWorkbook, buildWorkbook, toCsv } from './lib/exporters';
export {
  WorkbookReadOptions,
  readIsrcs,
  readIsrcsFromWorkbook,
  readIsrcsFromText,
  parseIsrcList,
  createSampleWorkbook,
} from './lib/isrcSource';
export { Credentials, loadCredentials } from './lib/config';
