export { KaggleClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './client.js';
export type {
  FetchFn,
  KaggleClientOptions,
  ListCompetitionsParams,
  ListDatasetsParams,
  ListModelsParams,
  ModelPage,
} from './client.js';

export {
  CREDENTIALS_FILENAME,
  createCredentialsProvider,
  defaultConfigDir,
  loadCredentials,
} from './credentials.js';
export type { CredentialsProvider, KaggleCredentials, LoadCredentialsOptions } from './credentials.js';

export { extractArchive, writeArchive } from './archive.js';
export type { ExtractArchiveResult } from './archive.js';

export { fileExists, writeDownload } from './download.js';
export type { WriteDownloadResult } from './download.js';

export { ArchiveError, KaggleApiError, RequestTimeoutError } from './errors.js';

export { KAGGLE_WEB_URL } from './schemas.js';
export type { Competition, DataFile, Dataset, Model } from './schemas.js';
