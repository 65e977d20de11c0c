import { vi } from "vitest";
import { silentLogger } from "../src/adapters";
import { ModelsApiClient } from "../src/client";
import type { ModelsApiClientOptions } from "../src/config";

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body?: string;
}

export function jsonResponse(
  payload: unknown,
  status = 200,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export function createStubClient(
  respond: (request: RecordedRequest) => Response | Promise<Response>,
  options: Partial<ModelsApiClientOptions> = {},
) {
  const requests: RecordedRequest[] = [];
  const fetchFn = vi.fn<typeof fetch>(async (input, init) => {
    const request: RecordedRequest = {
      url: String(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined,
    };
    requests.push(request);
    return respond(request);
  });

  const client = new ModelsApiClient({
    apiKey: "test-key",
    logger: silentLogger,
    fetchFn,
    ...options,
  });

  return { client, fetchFn, requests };
}

export async function expectRejection<E extends Error>(
  promise: Promise<unknown>,
  kind: new (...args: never[]) => E,
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof kind) return error;
    throw error;
  }
  throw new Error(`Expected the call to reject with ${kind.name}`);
}

export const sampleModel = {
  id: 7,
  name: "EURUSD breakout",
  model_uuid: "u1",
  active: 1,
  exit_type: "TP",
  tp_pips: 50,
  sl_pips: 25,
  instrument: "EURUSD",
  entry_granularity: "5M",
  exit_granularity: "15M",
} as const;
