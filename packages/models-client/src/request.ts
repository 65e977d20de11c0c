import type { z } from "zod";
import type { FetchFn, Logger } from "./adapters";
import type { ModelsApiConfig } from "./config";
import {
  ApiRequestError,
  AuthenticationError,
  ClientClosedError,
  NotFoundError,
  RateLimitError,
  ValidationError,
  type ValidationErrors,
} from "./errors";
import { buildQueryString, type QueryParams } from "./query";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface RequestOptions<T> {
  schema: ResponseSchema<T>;
  query?: QueryParams;
  body?: unknown;
}

export interface RequestLayerDeps {
  config: ModelsApiConfig;
  fetchFn: FetchFn;
  logger: Logger;
  /** Aborted when the owning client closes. */
  closeSignal: AbortSignal;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonSafely(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function toMessages(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) return value.flatMap(toMessages);
  if (isRecord(value) && typeof value.msg === "string") return [value.msg];
  if (isRecord(value) && typeof value.message === "string") return [value.message];
  return [JSON.stringify(value)];
}

function appendErrors(target: ValidationErrors, field: string, messages: string[]): void {
  if (messages.length === 0) return;
  target[field] = [...(target[field] ?? []), ...messages];
}

/**
 * Collects field-level errors from the shapes the API emits:
 * `{ errors: { field: msg | msg[] } }`, `{ validation_errors: {...} }`,
 * `{ errors: [{ field, message }] }` and `{ detail: [{ loc, msg }] }`.
 */
export function extractValidationErrors(payload: unknown): ValidationErrors {
  const result: ValidationErrors = {};
  if (!isRecord(payload)) return result;

  for (const key of ["errors", "validation_errors"]) {
    const group = payload[key];
    if (isRecord(group)) {
      for (const [field, messages] of Object.entries(group)) {
        appendErrors(result, field, toMessages(messages));
      }
    }
  }

  const items: unknown[] = [
    ...(Array.isArray(payload.errors) ? payload.errors : []),
    ...(Array.isArray(payload.detail) ? payload.detail : []),
  ];
  for (const item of items) {
    if (!isRecord(item)) continue;
    const loc = Array.isArray(item.loc) ? item.loc : undefined;
    const field =
      typeof item.field === "string"
        ? item.field
        : loc && loc.length > 0
          ? String(loc[loc.length - 1])
          : undefined;
    if (field === undefined) continue;
    appendErrors(result, field, toMessages(item.msg ?? item.message));
  }

  return result;
}

function extractMessage(payload: unknown): string | undefined {
  if (!isRecord(payload)) return undefined;
  for (const key of ["message", "error", "detail"]) {
    const value = payload[key];
    if (typeof value === "string" && value.length > 0) return value;
  }
  return undefined;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) return undefined;
  const seconds = Number(header.trim());
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Maps a non-2xx response to the error kind its status stands for.
 */
export function toResponseError(
  status: number,
  text: string,
  headers: Headers,
): ApiRequestError {
  const payload = parseJsonSafely(text);
  const detail = extractMessage(payload);
  const message = `Models API request failed (${status})${detail ? `: ${detail}` : ""}`;
  const details = { status, body: text };

  switch (status) {
    case 401:
      return new AuthenticationError(message, details);
    case 400:
    case 422:
      return new ValidationError(message, extractValidationErrors(payload), details);
    case 404:
      return new NotFoundError(message, details);
    case 429:
      return new RateLimitError(message, parseRetryAfter(headers.get("retry-after")), details);
    default:
      return new ApiRequestError(message, details);
  }
}

function linkAbortSignal(parent: AbortSignal, timeoutMs: number) {
  const controller = new AbortController();
  let timedOut = false;

  const onClose = () => controller.abort(parent.reason);
  parent.addEventListener("abort", onClose, { once: true });

  const timer =
    timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort(new Error(`timed out after ${timeoutMs}ms`));
        }, timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    release: () => {
      if (timer !== undefined) clearTimeout(timer);
      parent.removeEventListener("abort", onClose);
    },
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Builds the authenticated request function shared by every endpoint. It
 * issues one HTTP call per invocation and never retries.
 */
export const createRequestLayer = (deps: RequestLayerDeps) => {
  const { config, fetchFn, logger, closeSignal } = deps;

  const send = async (
    method: HttpMethod,
    path: string,
    url: string,
    init: RequestInit,
  ): Promise<{ response: Response; text: string }> => {
    const link = linkAbortSignal(closeSignal, config.timeoutMs);
    try {
      const response = await fetchFn(url, { ...init, signal: link.signal });
      const text = await response.text();
      return { response, text };
    } catch (error) {
      if (closeSignal.aborted) {
        throw new ClientClosedError();
      }
      const reason = link.timedOut()
        ? `timed out after ${config.timeoutMs}ms`
        : describeError(error);
      logger.warn("Models API request failed", { method, path, reason });
      throw new ApiRequestError(`Models API request failed: ${method} ${path}: ${reason}`, {
        cause: error,
      });
    } finally {
      link.release();
    }
  };

  const request = async <T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions<T>,
  ): Promise<T> => {
    if (closeSignal.aborted) {
      throw new ClientClosedError();
    }

    const url = `${config.baseUrl}${path}${buildQueryString(options.query)}`;
    const body = options.body === undefined ? undefined : JSON.stringify(options.body);
    const headers: Record<string, string> = {
      Accept: "application/json",
      [config.apiKeyHeader]: config.apiKey,
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    logger.debug("Models API request", { method, path });

    const { response, text } = await send(method, path, url, { method, headers, body });

    if (!response.ok) {
      logger.warn("Models API request failed", { method, path, status: response.status });
      throw toResponseError(response.status, text, response.headers);
    }

    let payload: unknown = null;
    if (text) {
      try {
        payload = JSON.parse(text);
      } catch (error) {
        throw new ApiRequestError(`Models API returned malformed JSON for ${method} ${path}`, {
          status: response.status,
          body: text,
          cause: error,
        });
      }
    }

    const parsed = options.schema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new ApiRequestError(`Unexpected response for ${method} ${path}: ${issues}`, {
        status: response.status,
        body: text,
        cause: parsed.error,
      });
    }

    return parsed.data;
  };

  return { request };
};

export type RequestLayer = ReturnType<typeof createRequestLayer>;
