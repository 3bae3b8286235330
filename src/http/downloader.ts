/**
 * HTTP downloader.
 *
 * One axios instance per downloader, created with the user agent and
 * (optionally) basic credentials as default headers, so every request
 * carries them. A 404 is a normal "not there" answer for the
 * `tryDownload*` methods; every other failure is thrown.
 */

import { createWriteStream } from "node:fs";
import * as node_fs from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import type { Readable } from "node:stream";
import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import type { Logger } from "winston";
import { ValidationError } from "../types/errors.js";
import { VERSION } from "../version.js";

export const DEFAULT_USER_AGENT = `scanprep/${VERSION}`;

export type DownloadResult =
  | { readonly found: true; readonly data: string }
  | { readonly found: false };

export interface DownloaderOptions {
  readonly logger: Logger;
  readonly userName?: string | undefined;
  readonly password?: string | undefined;
  readonly userAgent?: string;
  readonly timeoutMs?: number;
  /** Replaces axios' transport; tests pass an in-process adapter. */
  readonly adapter?: AxiosAdapter;
}

export interface Downloader {
  /** Value of a persistent request header, or undefined if it is not set. */
  getHeader(name: string): string | undefined;
  tryDownloadIfExists(url: string): Promise<DownloadResult>;
  tryDownloadFileIfExists(url: string, targetFilePath: string): Promise<boolean>;
  download(url: string): Promise<string>;
}

function isAscii(value: string): boolean {
  return /^[\x00-\x7F]*$/.test(value);
}

/**
 * Build the `Authorization` header value for basic authentication.
 *
 * @throws ValidationError when the credentials cannot be carried by basic auth.
 */
export function basicAuthHeader(userName: string, password: string): string {
  if (userName.includes(":")) {
    throw new ValidationError(
      "username cannot contain the ':' character due to basic authentication limitations",
    );
  }
  if (!isAscii(userName) || !isAscii(password)) {
    throw new ValidationError(
      "username and password should contain only ASCII characters due to basic authentication limitations",
    );
  }
  const encoded = Buffer.from(`${userName}:${password}`, "ascii").toString("base64");
  return `Basic ${encoded}`;
}

function isNotFound(cause: unknown): boolean {
  return axios.isAxiosError(cause) && cause.response?.status === 404;
}

function toText(data: unknown): string {
  if (typeof data === "string") {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf-8");
  }
  return JSON.stringify(data);
}

/**
 * Create the shared axios instance with persistent default headers.
 * Also used by the build-server client so both send the same user agent.
 */
export function createHttpClient(
  headers: Readonly<Record<string, string>>,
  options: Pick<DownloaderOptions, "timeoutMs" | "adapter"> = {},
): AxiosInstance {
  return axios.create({
    headers: { ...headers },
    ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
    ...(options.adapter !== undefined ? { adapter: options.adapter } : {}),
  });
}

export function createDownloader(options: DownloaderOptions): Downloader {
  const logger = options.logger.child({ module: "Downloader" });

  const headers: Record<string, string> = {
    "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
  };
  if (options.userName !== undefined) {
    headers.Authorization = basicAuthHeader(options.userName, options.password ?? "");
  }

  const client = createHttpClient(headers, options);

  async function getText(url: string): Promise<string> {
    const response = await client.get<unknown>(url, { responseType: "text" });
    return toText(response.data);
  }

  return {
    getHeader(name: string): string | undefined {
      const wanted = name.toLowerCase();
      for (const [key, value] of Object.entries(headers)) {
        if (key.toLowerCase() === wanted) {
          return value;
        }
      }
      return undefined;
    },

    async tryDownloadIfExists(url: string): Promise<DownloadResult> {
      logger.debug(`Downloading from ${url}...`);
      try {
        return { found: true, data: await getText(url) };
      } catch (cause: unknown) {
        if (isNotFound(cause)) {
          logger.debug(`Not found: ${url}`);
          return { found: false };
        }
        throw cause;
      }
    },

    async tryDownloadFileIfExists(url: string, targetFilePath: string): Promise<boolean> {
      logger.debug(`Downloading file from ${url} to ${targetFilePath}...`);
      let body: Readable;
      try {
        const response = await client.get<Readable>(url, { responseType: "stream" });
        body = response.data;
      } catch (cause: unknown) {
        if (isNotFound(cause)) {
          logger.debug(`Not found: ${url}`);
          return false;
        }
        throw cause;
      }
      try {
        await pipeline(body, createWriteStream(targetFilePath));
      } catch (cause: unknown) {
        await node_fs.rm(targetFilePath, { force: true });
        throw cause;
      }
      return true;
    },

    async download(url: string): Promise<string> {
      logger.debug(`Downloading from ${url}...`);
      return getText(url);
    },
  };
}
