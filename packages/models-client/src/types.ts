import { z } from "zod";

/**
 * Wire-level DTOs for the FX models API. Field names mirror the JSON the
 * server sends and accepts, so they stay snake_case.
 */

export const TradeTypeSchema = z.enum(["LONG", "SHORT"]);
export type TradeType = z.infer<typeof TradeTypeSchema>;

export const TradeResultSchema = z.enum(["TP", "SL"]);
export type TradeResult = z.infer<typeof TradeResultSchema>;

export const ActiveFlagSchema = z.union([z.literal(0), z.literal(1)]);
export type ActiveFlag = z.infer<typeof ActiveFlagSchema>;

/**
 * Free-form JSON object, used by observation values.
 */
export const JsonObjectSchema = z.record(z.string(), z.unknown());
export type JsonObject = z.infer<typeof JsonObjectSchema>;

// ---------- Entities ----------

/**
 * A configured trading strategy tracked by the API.
 */
export const ModelSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  model_uuid: z.string(),
  active: ActiveFlagSchema,
  exit_type: z.string(),
  tp_pips: z.number(),
  sl_pips: z.number(),
  instrument: z.string().nullish(),
  entry_granularity: z.string().nullish(),
  exit_granularity: z.string().nullish(),
});
export type Model = z.infer<typeof ModelSchema>;

export const ObservationSchema = z.object({
  id: z.number().int(),
  model_id: z.number().int(),
  timestamp: z.string().nullish(),
  value: JsonObjectSchema,
});
export type Observation = z.infer<typeof ObservationSchema>;

export const PropertySchema = z.object({
  id: z.number().int(),
  model_id: z.number().int(),
  property_type_id: z.number().int(),
  value: z.string(),
});
export type Property = z.infer<typeof PropertySchema>;

export const PropertyTypeSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().nullish(),
});
export type PropertyType = z.infer<typeof PropertyTypeSchema>;

/**
 * One trade recorded for a model. `trade_result`, `ts_close` and `pips` stay
 * empty while the trade is open.
 */
export const TradeHistorySchema = z.object({
  id: z.number().int(),
  model_id: z.number().int(),
  model_uuid: z.string().nullish(),
  trade_type: TradeTypeSchema,
  trade_result: TradeResultSchema.nullish(),
  ts_open: z.string(),
  ts_close: z.string().nullish(),
  pips: z.number().nullish(),
  balance: z.number().nullish(),
  open_price: z.number().nullish(),
  close_price: z.number().nullish(),
});
export type TradeHistory = z.infer<typeof TradeHistorySchema>;

// ---------- Aggregates ----------

/**
 * Server-side aggregate over a model's trade history.
 */
export const ModelStatsSchema = z.object({
  model_id: z.number().int().nullish(),
  total_trades: z.number().int().nonnegative(),
  wins: z.number().int().nonnegative().optional(),
  losses: z.number().int().nonnegative().optional(),
  win_rate: z.number(),
  total_pips: z.number(),
  average_pips: z.number(),
});
export type ModelStats = z.infer<typeof ModelStatsSchema>;

export const GranularityCountSchema = z.object({
  granularity: z.string(),
  count: z.number().int().nonnegative(),
});
export type GranularityCount = z.infer<typeof GranularityCountSchema>;

export const InstrumentCountSchema = z.object({
  instrument: z.string(),
  count: z.number().int().nonnegative(),
});
export type InstrumentCount = z.infer<typeof InstrumentCountSchema>;

/**
 * Counts of active models grouped by instrument and by entry/exit granularity.
 */
export const ActiveStatsSchema = z.object({
  by_instrument: z.array(InstrumentCountSchema).default([]),
  by_entry: z.array(GranularityCountSchema).default([]),
  by_exit: z.array(GranularityCountSchema).default([]),
});
export type ActiveStats = z.infer<typeof ActiveStatsSchema>;

// ---------- Envelopes ----------

export const ModelListResponseSchema = z.object({
  models: z.array(ModelSchema).default([]),
});

export const ObservationListResponseSchema = z.object({
  observations: z.array(ObservationSchema).default([]),
});

export const PropertyListResponseSchema = z.object({
  properties: z.array(PropertySchema).default([]),
});

export const PropertyTypeListResponseSchema = z.object({
  property_types: z.array(PropertyTypeSchema).default([]),
});

export const EntryGranularitiesResponseSchema = z.object({
  entry_granularities: z.array(z.string()).default([]),
});

export const ExitGranularitiesResponseSchema = z.object({
  exit_granularities: z.array(z.string()).default([]),
});

/**
 * Paginated trade history. `count` is the total number of matching trades,
 * which may exceed `trades.length` when `limit` is used.
 */
export const TradeHistoryResponseSchema = z.object({
  count: z.number().int().nonnegative().default(0),
  trades: z.array(TradeHistorySchema).default([]),
});
export type TradeHistoryResponse = z.infer<typeof TradeHistoryResponseSchema>;

/**
 * Acknowledgement the API sends for writes that do not echo the entity. A
 * `204 No Content` reply parses as an empty object.
 */
const MutationAckBodySchema = z.object({
  message: z.string().optional(),
  id: z.number().int().optional(),
});
export type MutationAck = z.infer<typeof MutationAckBodySchema>;

export const MutationAckSchema = MutationAckBodySchema.nullable().transform(
  (value): MutationAck => value ?? {},
);

export const DeleteResponseSchema = MutationAckSchema;
export type DeleteResponse = MutationAck;

// Update endpoints reply with either the updated entity or an acknowledgement.
export const ModelUpdateResponseSchema = z.union([ModelSchema, MutationAckSchema]);
export type ModelUpdateResponse = z.infer<typeof ModelUpdateResponseSchema>;

export const ObservationUpdateResponseSchema = z.union([ObservationSchema, MutationAckSchema]);
export type ObservationUpdateResponse = z.infer<typeof ObservationUpdateResponseSchema>;

export const PropertyUpdateResponseSchema = z.union([PropertySchema, MutationAckSchema]);
export type PropertyUpdateResponse = z.infer<typeof PropertyUpdateResponseSchema>;

// ---------- Requests ----------

export const ModelCreateRequestSchema = z.object({
  name: z.string().min(1),
  model_uuid: z.string().min(1),
  active: ActiveFlagSchema,
  exit_type: z.string().min(1),
  tp_pips: z.number().nonnegative(),
  sl_pips: z.number().nonnegative(),
  instrument: z.string().min(1).optional(),
  entry_granularity: z.string().min(1).optional(),
  exit_granularity: z.string().min(1).optional(),
});
export type ModelCreateRequest = z.infer<typeof ModelCreateRequestSchema>;

export const ModelUpdateRequestSchema = ModelCreateRequestSchema.partial();
export type ModelUpdateRequest = z.infer<typeof ModelUpdateRequestSchema>;

export const ObservationCreateRequestSchema = z.object({
  model_id: z.number().int().positive(),
  value: JsonObjectSchema,
  timestamp: z.string().min(1).optional(),
});
export type ObservationCreateRequest = z.infer<typeof ObservationCreateRequestSchema>;

export const ObservationUpdateRequestSchema = ObservationCreateRequestSchema.partial();
export type ObservationUpdateRequest = z.infer<typeof ObservationUpdateRequestSchema>;

export const PropertyCreateRequestSchema = z.object({
  model_id: z.number().int().positive(),
  property_type_id: z.number().int().positive(),
  value: z.string(),
});
export type PropertyCreateRequest = z.infer<typeof PropertyCreateRequestSchema>;

export const PropertyUpdateRequestSchema = PropertyCreateRequestSchema.partial();
export type PropertyUpdateRequest = z.infer<typeof PropertyUpdateRequestSchema>;

// ---------- Filters ----------

/**
 * A list filter, either as separate values or as an already comma-joined
 * string.
 */
const ListFilterSchema = z.union([z.string(), z.array(z.string())]);
export type ListFilter = z.infer<typeof ListFilterSchema>;

export const ModelFiltersSchema = z.object({
  uuids: ListFilterSchema.optional(),
  active: z.union([ActiveFlagSchema, z.boolean()]).optional(),
  entryGranularity: ListFilterSchema.optional(),
  exitGranularity: ListFilterSchema.optional(),
});
export type ModelFilters = z.infer<typeof ModelFiltersSchema>;

export const ModelScopedFiltersSchema = z.object({
  modelId: z.number().int().positive().optional(),
});
export type ObservationFilters = z.infer<typeof ModelScopedFiltersSchema>;
export type PropertyFilters = z.infer<typeof ModelScopedFiltersSchema>;

export const TradeHistoryFiltersSchema = z.object({
  modelId: z.number().int().positive().optional(),
  modelUuid: z.string().min(1).optional(),
  tradeType: TradeTypeSchema.optional(),
  tradeResult: TradeResultSchema.optional(),
  tsOpenStart: z.string().min(1).optional(),
  tsOpenEnd: z.string().min(1).optional(),
  tsCloseStart: z.string().min(1).optional(),
  tsCloseEnd: z.string().min(1).optional(),
  minPips: z.number().optional(),
  maxPips: z.number().optional(),
  minBalance: z.number().optional(),
  maxBalance: z.number().optional(),
  open: z.boolean().optional(),
  limit: z.number().int().positive().optional(),
  offset: z.number().int().nonnegative().optional(),
  orderBy: z.string().min(1).optional(),
  order: z.enum(["asc", "desc"]).optional(),
});
export type TradeHistoryFilters = z.infer<typeof TradeHistoryFiltersSchema>;
