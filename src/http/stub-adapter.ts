/**
 * In-process axios adapter for tests.
 *
 * Routes are matched on the full request URL. Responses go through the
 * request's `validateStatus` the way axios' own adapters settle them, so
 * a 404 route rejects with an AxiosError carrying the response.
 */

import { Readable } from "node:stream";
import {
  AxiosError,
  AxiosHeaders,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";

export interface StubRoute {
  readonly status: number;
  readonly body?: unknown;
}

export interface StubAdapter {
  readonly adapter: AxiosAdapter;
  readonly requests: InternalAxiosRequestConfig[];
}

function requestUrl(config: InternalAxiosRequestConfig): string {
  const url = config.url ?? "";
  if (config.baseURL === undefined || /^[a-z]+:\/\//i.test(url)) {
    return url;
  }
  return `${config.baseURL.replace(/\/+$/, "")}/${url.replace(/^\/+/, "")}`;
}

function encodeBody(config: InternalAxiosRequestConfig, body: unknown): unknown {
  if (body instanceof Readable) {
    return body;
  }
  if (config.responseType === "stream") {
    return Readable.from([Buffer.from(typeof body === "string" ? body : JSON.stringify(body))]);
  }
  return body;
}

export function createStubAdapter(routes: Readonly<Record<string, StubRoute>>): StubAdapter {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const url = requestUrl(config);
    const route = routes[url];
    if (route === undefined) {
      throw new AxiosError(`connect ECONNREFUSED for ${url}`, "ECONNREFUSED", config);
    }

    const response: AxiosResponse = {
      data: encodeBody(config, route.body ?? ""),
      status: route.status,
      statusText: String(route.status),
      headers: new AxiosHeaders(),
      config,
    };

    const validate = config.validateStatus;
    if (validate === undefined || validate === null || validate(route.status)) {
      return response;
    }
    throw new AxiosError(
      `Request failed with status code ${route.status}`,
      route.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      undefined,
      response,
    );
  };

  return { adapter, requests };
}
