/**
 * HTTP helpers for provider adapters
 *
 * Every failure is mapped onto the network error taxonomy so the gate can
 * decide what to retry.
 */

import type { z } from "zod";
import {
  errorFromResponse,
  errorMessage,
  NetworkError,
  TimeoutError,
} from "../../errors";

export interface HttpRequestOptions {
  provider: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export async function httpGet(
  url: string,
  options: HttpRequestOptions
): Promise<Response> {
  const { provider, headers, signal } = options;

  let response: Response;
  try {
    response = await fetch(url, { method: "GET", headers, signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new TimeoutError(`${provider} request aborted`, {
        provider,
        url,
        cause: error,
      });
    }
    throw new NetworkError(`${provider} request failed: ${errorMessage(error)}`, {
      provider,
      url,
      retryable: true,
      cause: error,
    });
  }

  if (!response.ok) {
    throw errorFromResponse(response.status, response.headers, provider, url);
  }
  return response;
}

export async function httpGetJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: HttpRequestOptions
): Promise<T> {
  const response = await httpGet(url, {
    ...options,
    headers: { Accept: "application/json", ...options.headers },
  });

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new NetworkError(`${options.provider} returned invalid JSON`, {
      provider: options.provider,
      url,
      cause: error,
    });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new NetworkError(`${options.provider} returned an unexpected payload`, {
      provider: options.provider,
      url,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export async function httpGetText(
  url: string,
  options: HttpRequestOptions
): Promise<{ text: string; contentType: string }> {
  const response = await httpGet(url, options);
  return {
    text: await response.text(),
    contentType: response.headers.get("content-type") ?? "",
  };
}
