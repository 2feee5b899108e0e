import axios, {
  AxiosError,
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import { vi } from "vitest";
import type { ServiceLogger } from "../../src/services/logger-service.ts";

export interface FakeReply {
  status: number;
  data?: unknown;
}

export type FakeRoute = (request: InternalAxiosRequestConfig) => FakeReply;

export interface FakeApi {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
}

/**
 * Axios instance whose adapter answers in process. Replies outside the
 * accepted status range reject the way the HTTP adapter does.
 */
export function createFakeApi(route: FakeRoute): FakeApi {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = route(config);
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };

    if (config.validateStatus && !config.validateStatus(reply.status)) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        reply.status >= 500
          ? AxiosError.ERR_BAD_RESPONSE
          : AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response,
      );
    }
    return response;
  };

  return {
    http: axios.create({ baseURL: "http://api.test", adapter }),
    requests,
  };
}

export const routeKey = (request: InternalAxiosRequestConfig): string =>
  `${(request.method ?? "get").toUpperCase()} ${request.url ?? ""}`;

export const jsonBody = (request: InternalAxiosRequestConfig): unknown =>
  JSON.parse(String(request.data));

export const makeLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}) satisfies Required<ServiceLogger>;
