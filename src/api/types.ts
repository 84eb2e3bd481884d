import type { CallOptions } from '../core/types.js';
import type { FetchClientProvider, HeaderOptions } from '../types/request.js';
import type { Logger } from '../utils/logger.js';

/** A document as stored in a collection. */
export type Document = Record<string, unknown>;

/** Arbitrary JSON object sent as filters, payloads or extra data. */
export type JsonObject = Record<string, unknown>;

/** Runtime-adjustable part of the client configuration. */
export interface ShipthisConfig {
  /**
   * API key sent as `x-api-key`; `null` clears it.
   * @default undefined
   */
  apiKey?: string | null;
  /**
   * User type sent as `usertype`.
   * @default 'employee'
   */
  userType?: string;
  /**
   * Region sent as `region`.
   * @default undefined, or the organisation's first region after `connect()`
   */
  regionId?: string | null;
  /**
   * Location sent as `location`, and as the `location` query of reports and autocomplete.
   * @default undefined, or the first location of the region after `connect()`
   */
  locationId?: string | null;
  /**
   * Timeout per request in milliseconds.
   * @default 30000
   */
  timeout?: number;
  /**
   * Headers applied over the built-in ones on every request; `null` removes one.
   * @default undefined
   */
  customHeaders?: HeaderOptions;
}

/** Constructor options for `ShipthisClient`. */
export interface ShipthisClientProps extends ShipthisConfig {
  /** Organisation id sent as `organisation`. */
  organisation: string;
  /**
   * Base endpoint every path is resolved against.
   * @default 'https://api.shipthis.co/api/v3/'
   */
  baseUrl?: string;
  /**
   * Logger for request and connection events.
   * @default a silent pino logger
   */
  logger?: Logger;
  /**
   * Transport implementation, mostly useful in tests.
   * @default FetchClient
   */
  fetchProvider?: FetchClientProvider;
}

/** A location within a region. */
export interface OrganisationLocation {
  location_id?: string | null;
  [key: string]: unknown;
}

/** A region of an organisation. */
export interface OrganisationRegion {
  region_id?: string | null;
  locations?: unknown[] | null;
  [key: string]: unknown;
}

/** Organisation metadata as returned by `user-auth/info`; `regions` holds {@link OrganisationRegion} entries. */
export type OrganisationInfo = Record<string, unknown>;

/** Outcome of `connect()`. */
export interface ConnectResult {
  regionId: string | null;
  locationId: string | null;
  organisation: OrganisationInfo;
}

/** One key of a multi-field sort. */
export interface SortField {
  field: string;
  order: 'asc' | 'desc';
}

export interface GetOneItemOptions extends CallOptions {
  /**
   * Document id; without it the first document of the (filtered) list is returned.
   * @default undefined
   */
  id?: string;
  /**
   * Query filter, sent JSON-encoded as `query_filter_v2`. Ignored when `id` is set.
   * @default undefined
   */
  filters?: JsonObject;
  /**
   * Comma-separated fields to return, sent as `only`.
   * @default undefined
   */
  onlyFields?: string;
}

export interface GetListOptions extends CallOptions {
  /**
   * Query filter, sent JSON-encoded as `query_filter_v2`.
   * @default undefined
   */
  filters?: JsonObject;
  /**
   * Free-text search, sent as `search_query`.
   * @default undefined
   */
  searchQuery?: string;
  /** @default 1 */
  page?: number;
  /** @default 20 */
  count?: number;
  /**
   * Comma-separated fields to return, sent as `only`.
   * @default undefined
   */
  onlyFields?: string;
  /**
   * Sort keys in priority order, sent JSON-encoded as `multi_sort`.
   * @default undefined
   */
  sort?: SortField[];
  /**
   * Output format, sent as `output_type`.
   * @default undefined
   */
  outputType?: string;
  /**
   * Whether the server should include metadata; `false` sends `meta=false`.
   * @default true
   */
  meta?: boolean;
}

export type SearchOptions = Pick<GetListOptions, 'page' | 'count' | 'onlyFields'> & CallOptions;

export interface CreateItemOptions extends CallOptions {
  /**
   * Create even if new required fields are missing.
   * @default false
   */
  ignoreNewRequired?: boolean;
  /**
   * Keep an existing sequence number instead of generating one.
   * @default false
   */
  skipSequenceIfExists?: boolean;
  /**
   * Number of copies to create, capped at 100.
   * @default 0
   */
  replicateCount?: number;
  /**
   * Input filters, sent JSON-encoded as `input_filters`.
   * @default undefined
   */
  inputFilters?: JsonObject;
  /**
   * Workflow action metadata, sent as `action_op_data`.
   * @default undefined
   */
  actionOpData?: JsonObject;
}

export interface ReportViewOptions extends CallOptions {
  /**
   * Extra filter data sent as the body.
   * @default undefined
   */
  postData?: JsonObject;
  /** @default 'json' */
  outputType?: string;
  /** @default true */
  skipMeta?: boolean;
}

export interface ExchangeRateOptions extends CallOptions {
  /** @default 'USD' */
  target?: string;
  /**
   * Rate date as a timestamp in milliseconds.
   * @default Date.now()
   */
  date?: number;
}

export interface PlaceDetailsOptions extends CallOptions {
  /** @default '' */
  description?: string;
}

/** Message payload of a conversation; `type` becomes the message type. */
export interface ConversationInput {
  type?: string;
  [key: string]: unknown;
}

export interface ConversationListOptions extends CallOptions {
  /** @default 'all' */
  messageType?: string;
  /** @default 1 */
  page?: number;
  /** @default 100 */
  count?: number;
}

export interface BulkEditOptions extends CallOptions {
  /**
   * Extra data for updates mirrored to external systems.
   * @default undefined
   */
  externalUpdateData?: JsonObject;
}

export interface PrimaryWorkflowActionOptions extends CallOptions {
  /**
   * State the document is expected to be in.
   * @default undefined
   */
  startStateId?: string;
}

export interface SecondaryWorkflowActionOptions extends CallOptions {
  /**
   * Extra payload sent as the body.
   * @default {}
   */
  additionalData?: JsonObject;
}

export interface UploadFileOptions extends CallOptions {
  /**
   * File name sent with the part.
   * @default the path's base name, the `File` name, or 'upload'
   */
  fileName?: string;
}
