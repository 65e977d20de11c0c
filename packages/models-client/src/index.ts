/**
 * `@fx-models/client` is the typed integration layer for the FX models REST
 * API: DTO schemas, the error kinds raised for failed calls, and the client
 * facade with one method per endpoint.
 */
export * from "./types";
export * from "./errors";
export * from "./adapters";
export * from "./config";
export * from "./query";
export { createRequestLayer, extractValidationErrors, toResponseError } from "./request";
export type { HttpMethod, RequestLayer, RequestOptions, ResponseSchema } from "./request";
export * from "./client";
