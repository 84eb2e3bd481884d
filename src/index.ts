/**
 * Root entrypoint for the Shipthis client: re-exports the API client, the
 * dispatcher it is built on, types, and error utilities.
 * @module
 */

/**
 * Client for the Shipthis REST API. Every operation resolves an error-first tuple.
 */
export { ShipthisClient } from './api/client.js';

/** Default base endpoint and the replicate-count cap. */
export { DEFAULT_BASE_URL, MAX_REPLICATE_COUNT } from './api/schemas.js';

/** Upload endpoint derivation. */
export { uploadUrlFor } from './api/upload.js';

export type {
  BulkEditOptions,
  ConnectResult,
  ConversationInput,
  ConversationListOptions,
  CreateItemOptions,
  Document,
  ExchangeRateOptions,
  GetListOptions,
  GetOneItemOptions,
  JsonObject,
  OrganisationInfo,
  OrganisationLocation,
  OrganisationRegion,
  PlaceDetailsOptions,
  PrimaryWorkflowActionOptions,
  ReportViewOptions,
  SearchOptions,
  SecondaryWorkflowActionOptions,
  ShipthisClientProps,
  ShipthisConfig,
  SortField,
  UploadFileOptions,
} from './api/types.js';

/**
 * Request dispatcher shared by every operation.
 */
export { DEFAULT_TIMEOUT, RequestClient } from './core/client.js';

export type { CallOptions, DispatchRequest, RequestClientProps } from './core/types.js';

/**
 * Default `fetch`-based transport.
 */
export { FetchClient } from './fetch/client.js';

export type { FetchClientProvider, FetchClientProviderDefinition, HeaderOptions } from './types/request.js';

/**
 * Error classes, type guards and cause-chain helpers.
 */
export * from './error/index.js';

/** Creates the default silent pino logger. */
export { createLogger, type Logger } from './utils/logger.js';

export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
