import {
  ModelFiltersSchema,
  ModelScopedFiltersSchema,
  TradeHistoryFiltersSchema,
  type ModelFilters,
  type ObservationFilters,
  type PropertyFilters,
  type TradeHistoryFilters,
} from "./types";

export type QueryValue = string | number | boolean | readonly (string | number)[];

/**
 * Query-string entries keyed by their wire name. Entries left `undefined` or
 * `null` are never sent.
 */
export type QueryParams = Record<string, QueryValue | null | undefined>;

// Commas separate list values and are left literal.
function encodeQueryComponent(value: string): string {
  return encodeURIComponent(value).replace(/%2C/gi, ",");
}

const isBlank = (value: string) => value.trim().length === 0;

function serializeValue(value: QueryValue): string | undefined {
  if (Array.isArray(value)) {
    const items = value.map(String).filter((item) => !isBlank(item));
    return items.length > 0 ? items.join(",") : undefined;
  }
  const text = String(value);
  return isBlank(text) ? undefined : text;
}

/**
 * Serializes query entries in insertion order, dropping absent values, blank
 * strings, blank list items and empty lists. Returns an empty string when nothing remains, otherwise the
 * query prefixed with `?`.
 */
export function buildQueryString(params: QueryParams = {}): string {
  const parts: string[] = [];

  for (const [key, raw] of Object.entries(params)) {
    if (raw === undefined || raw === null) continue;
    const value = serializeValue(raw);
    if (value === undefined) continue;
    parts.push(`${encodeQueryComponent(key)}=${encodeQueryComponent(value)}`);
  }

  return parts.length > 0 ? `?${parts.join("&")}` : "";
}

/**
 * `GET /models` filters. `active` is sent as `1` / `0`.
 */
export function modelFiltersToQuery(filters: ModelFilters = {}): QueryParams {
  const parsed = ModelFiltersSchema.parse(filters);
  const active =
    typeof parsed.active === "boolean" ? (parsed.active ? 1 : 0) : parsed.active;

  return {
    uuids: parsed.uuids,
    active,
    entry_granularity: parsed.entryGranularity,
    exit_granularity: parsed.exitGranularity,
  };
}

/**
 * Filters shared by the observation and property listings.
 */
export function modelScopedFiltersToQuery(
  filters: ObservationFilters | PropertyFilters = {},
): QueryParams {
  const parsed = ModelScopedFiltersSchema.parse(filters);
  return { model_id: parsed.modelId };
}

export function tradeHistoryFiltersToQuery(filters: TradeHistoryFilters = {}): QueryParams {
  const parsed = TradeHistoryFiltersSchema.parse(filters);

  return {
    model_id: parsed.modelId,
    model_uuid: parsed.modelUuid,
    trade_type: parsed.tradeType,
    trade_result: parsed.tradeResult,
    ts_open_start: parsed.tsOpenStart,
    ts_open_end: parsed.tsOpenEnd,
    ts_close_start: parsed.tsCloseStart,
    ts_close_end: parsed.tsCloseEnd,
    min_pips: parsed.minPips,
    max_pips: parsed.maxPips,
    min_balance: parsed.minBalance,
    max_balance: parsed.maxBalance,
    open: parsed.open,
    limit: parsed.limit,
    offset: parsed.offset,
    order_by: parsed.orderBy,
    order: parsed.order,
  };
}
