export {
  type Downloader,
  type DownloaderOptions,
  type DownloadResult,
  DEFAULT_USER_AGENT,
  basicAuthHeader,
  createDownloader,
  createHttpClient,
} from "./downloader.js";
