import { consoleLogger, type Logger } from "./adapters";
import {
  loadModelsApiConfig,
  resolveModelsApiConfig,
  type ModelsApiClientOptions,
  type ModelsApiConfig,
  type ModelsApiEnv,
} from "./config";
import {
  modelFiltersToQuery,
  modelScopedFiltersToQuery,
  tradeHistoryFiltersToQuery,
} from "./query";
import { createRequestLayer, type RequestLayer } from "./request";
import {
  ActiveStatsSchema,
  DeleteResponseSchema,
  EntryGranularitiesResponseSchema,
  ExitGranularitiesResponseSchema,
  ModelCreateRequestSchema,
  ModelListResponseSchema,
  ModelSchema,
  ModelStatsSchema,
  ModelUpdateRequestSchema,
  ModelUpdateResponseSchema,
  ObservationCreateRequestSchema,
  ObservationListResponseSchema,
  ObservationSchema,
  ObservationUpdateRequestSchema,
  ObservationUpdateResponseSchema,
  PropertyCreateRequestSchema,
  PropertyListResponseSchema,
  PropertySchema,
  PropertyTypeListResponseSchema,
  PropertyTypeSchema,
  PropertyUpdateRequestSchema,
  PropertyUpdateResponseSchema,
  TradeHistoryResponseSchema,
  type ActiveStats,
  type DeleteResponse,
  type Model,
  type ModelCreateRequest,
  type ModelFilters,
  type ModelStats,
  type ModelUpdateRequest,
  type ModelUpdateResponse,
  type Observation,
  type ObservationCreateRequest,
  type ObservationFilters,
  type ObservationUpdateRequest,
  type ObservationUpdateResponse,
  type Property,
  type PropertyCreateRequest,
  type PropertyFilters,
  type PropertyType,
  type PropertyUpdateRequest,
  type PropertyUpdateResponse,
  type TradeHistoryFilters,
  type TradeHistoryResponse,
} from "./types";

export const MODELS_API_CLIENT_VERSION = "1.0.0";

function idSegment(id: number): string {
  if (!Number.isInteger(id)) {
    throw new TypeError(`Expected an integer id, got ${id}`);
  }
  return String(id);
}

/**
 * Typed client for the FX models REST API.
 *
 * Each method maps to one endpoint: it validates the caller's input, issues a
 * single authenticated request, and parses the reply into DTOs. Failures
 * surface as the error kinds in `./errors` and are never retried.
 *
 * One instance owns one connection handle. Call `close()` when done, or use
 * `withModelsApiClient` to scope it.
 */
export class ModelsApiClient {
  readonly config: ModelsApiConfig;
  private readonly logger: Logger;
  private readonly lifecycle = new AbortController();
  private readonly http: RequestLayer;

  constructor(options: ModelsApiClientOptions) {
    this.config = resolveModelsApiConfig(options);
    this.logger = options.logger ?? consoleLogger;
    this.http = createRequestLayer({
      config: this.config,
      fetchFn: options.fetchFn ?? fetch,
      logger: this.logger,
      closeSignal: this.lifecycle.signal,
    });
  }

  get closed(): boolean {
    return this.lifecycle.signal.aborted;
  }

  /**
   * Aborts in-flight requests and rejects every later call. Safe to call more
   * than once.
   */
  close(): void {
    if (this.closed) return;
    this.lifecycle.abort();
    this.logger.debug("Models API client closed", { baseUrl: this.config.baseUrl });
  }

  getVersion(): string {
    return MODELS_API_CLIENT_VERSION;
  }

  // ---------- Models ----------

  /**
   * Lists every model matching the filters. The endpoint is not paginated.
   */
  async getModels(filters: ModelFilters = {}): Promise<Model[]> {
    const response = await this.http.request("GET", "/models", {
      query: modelFiltersToQuery(filters),
      schema: ModelListResponseSchema,
    });
    return response.models;
  }

  async createModel(request: ModelCreateRequest): Promise<Model> {
    return this.http.request("POST", "/models", {
      body: ModelCreateRequestSchema.parse(request),
      schema: ModelSchema,
    });
  }

  async getModelByUuid(uuid: string): Promise<Model> {
    return this.http.request("GET", `/models/${encodeURIComponent(uuid)}`, {
      schema: ModelSchema,
    });
  }

  /**
   * Resolves to the updated model, or to the server's acknowledgement when it
   * does not echo the entity.
   */
  async updateModel(modelId: number, request: ModelUpdateRequest): Promise<ModelUpdateResponse> {
    return this.http.request("PUT", `/models/${idSegment(modelId)}`, {
      body: ModelUpdateRequestSchema.parse(request),
      schema: ModelUpdateResponseSchema,
    });
  }

  async deleteModel(modelId: number): Promise<DeleteResponse> {
    return this.http.request("DELETE", `/models/${idSegment(modelId)}`, {
      schema: DeleteResponseSchema,
    });
  }

  /**
   * Counts of active models by instrument and entry/exit granularity.
   */
  async getActiveStats(): Promise<ActiveStats> {
    return this.http.request("GET", "/models/active_stats", {
      schema: ActiveStatsSchema,
    });
  }

  async getEntryGranularities(): Promise<string[]> {
    const response = await this.http.request("GET", "/models/entry_granularities", {
      schema: EntryGranularitiesResponseSchema,
    });
    return response.entry_granularities;
  }

  async getExitGranularities(): Promise<string[]> {
    const response = await this.http.request("GET", "/models/exit_granularities", {
      schema: ExitGranularitiesResponseSchema,
    });
    return response.exit_granularities;
  }

  // ---------- Observations ----------

  async getObservations(filters: ObservationFilters = {}): Promise<Observation[]> {
    const response = await this.http.request("GET", "/observations", {
      query: modelScopedFiltersToQuery(filters),
      schema: ObservationListResponseSchema,
    });
    return response.observations;
  }

  async createObservation(request: ObservationCreateRequest): Promise<Observation> {
    return this.http.request("POST", "/observations", {
      body: ObservationCreateRequestSchema.parse(request),
      schema: ObservationSchema,
    });
  }

  async getObservation(observationId: number): Promise<Observation> {
    return this.http.request("GET", `/observations/${idSegment(observationId)}`, {
      schema: ObservationSchema,
    });
  }

  async updateObservation(
    observationId: number,
    request: ObservationUpdateRequest,
  ): Promise<ObservationUpdateResponse> {
    return this.http.request("PUT", `/observations/${idSegment(observationId)}`, {
      body: ObservationUpdateRequestSchema.parse(request),
      schema: ObservationUpdateResponseSchema,
    });
  }

  async deleteObservation(observationId: number): Promise<DeleteResponse> {
    return this.http.request("DELETE", `/observations/${idSegment(observationId)}`, {
      schema: DeleteResponseSchema,
    });
  }

  // ---------- Properties ----------

  async getProperties(filters: PropertyFilters = {}): Promise<Property[]> {
    const response = await this.http.request("GET", "/properties", {
      query: modelScopedFiltersToQuery(filters),
      schema: PropertyListResponseSchema,
    });
    return response.properties;
  }

  async createProperty(request: PropertyCreateRequest): Promise<Property> {
    return this.http.request("POST", "/properties", {
      body: PropertyCreateRequestSchema.parse(request),
      schema: PropertySchema,
    });
  }

  async getProperty(propertyId: number): Promise<Property> {
    return this.http.request("GET", `/properties/${idSegment(propertyId)}`, {
      schema: PropertySchema,
    });
  }

  async updateProperty(
    propertyId: number,
    request: PropertyUpdateRequest,
  ): Promise<PropertyUpdateResponse> {
    return this.http.request("PUT", `/properties/${idSegment(propertyId)}`, {
      body: PropertyUpdateRequestSchema.parse(request),
      schema: PropertyUpdateResponseSchema,
    });
  }

  async deleteProperty(propertyId: number): Promise<DeleteResponse> {
    return this.http.request("DELETE", `/properties/${idSegment(propertyId)}`, {
      schema: DeleteResponseSchema,
    });
  }

  // ---------- Property types ----------

  async getPropertyTypes(): Promise<PropertyType[]> {
    const response = await this.http.request("GET", "/property_types", {
      schema: PropertyTypeListResponseSchema,
    });
    return response.property_types;
  }

  async getPropertyType(propertyTypeId: number): Promise<PropertyType> {
    return this.http.request("GET", `/property_types/${idSegment(propertyTypeId)}`, {
      schema: PropertyTypeSchema,
    });
  }

  // ---------- Trade history ----------

  /**
   * One page of trade history. Walking further pages is up to the caller,
   * through `limit` and `offset`.
   */
  async getTradeHistory(filters: TradeHistoryFilters = {}): Promise<TradeHistoryResponse> {
    return this.http.request("GET", "/trade-history", {
      query: tradeHistoryFiltersToQuery(filters),
      schema: TradeHistoryResponseSchema,
    });
  }

  async getModelStats(modelId: number): Promise<ModelStats> {
    return this.http.request("GET", `/trade-history/stats/${idSegment(modelId)}`, {
      schema: ModelStatsSchema,
    });
  }
}

/**
 * Builds a client from explicit options layered over the `FX_MODELS_*`
 * environment variables.
 */
export function createModelsApiClient(
  options: Partial<ModelsApiClientOptions> = {},
  env: ModelsApiEnv = process.env,
): ModelsApiClient {
  const config = loadModelsApiConfig(options, env);
  return new ModelsApiClient({ ...options, ...config });
}

/**
 * Runs `fn` with a fresh client and closes it afterwards, whether `fn`
 * resolves or throws.
 */
export async function withModelsApiClient<T>(
  clientOrOptions: ModelsApiClient | ModelsApiClientOptions,
  fn: (client: ModelsApiClient) => Promise<T>,
): Promise<T> {
  const client =
    clientOrOptions instanceof ModelsApiClient
      ? clientOrOptions
      : new ModelsApiClient(clientOrOptions);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
