import axios, { type AxiosRequestConfig } from "axios";
import type { ErrorResponse } from "./types.js";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Optional auth token for authenticated requests */
  token?: string;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
  query?: Record<string, unknown>;
  /** Aborting cancels the request; the server stops its search too */
  signal?: AbortSignal;
}

/** A non-2xx answer from the API, carrying the server's error body */
export class ApiError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly code?: string,
    public readonly details?: ErrorResponse["details"],
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function isErrorResponse(value: unknown): value is ErrorResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "message" in value &&
    typeof value.message === "string"
  );
}

/** Turn an axios HTTP error into an ApiError; anything else is rethrown as is */
export function toApiError(err: unknown): unknown {
  if (!axios.isAxiosError(err) || !err.response) return err;
  const { status, data } = err.response;
  if (!isErrorResponse(data)) return new ApiError(status, err.message);
  return new ApiError(status, data.message, data.code, data.details);
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;
  protected token?: string;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 30000;
    this.token = config.token;
  }

  /** Update the auth token (e.g., after login/refresh) */
  public setToken(token: string | undefined): void {
    this.token = token;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
    };

    if (this.token) {
      config.headers = {
        ...config.headers,
        Authorization: "Bearer " + this.token,
      };
    }

    if (params.query) {
      config.params = params.query;
    }

    if (params.signal) {
      config.signal = params.signal;
    }

    return config;
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    const path = this.buildPath(params);
    const config = this.buildConfig(params);
    try {
      const response = await axios.get<T>(path, config);
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    const path = this.buildPath(params);
    const config = this.buildConfig(params);
    try {
      const response = await axios.post<T>(path, params.body, config);
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }
}
