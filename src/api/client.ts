import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { z } from 'zod';
import { RequestClient } from '../core/client.js';
import { buildHeaders } from '../core/headers.js';
import type { CallOptions, DispatchRequest } from '../core/types.js';
import { RequestError } from '../error/requestError.js';
import type { ShipthisError } from '../error/shipthisError.js';
import { ValidationError } from '../error/validationError.js';
import type { HeaderOptions } from '../types/request.js';
import { isRecord } from '../utils/guards.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { buildPath } from '../utils/query.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import {
  bulkEditArgs,
  clientConfigSchema,
  clientPropsSchema,
  conversationArgs,
  conversationListArgs,
  createItemArgs,
  documentArgs,
  exchangeRateArgs,
  getListArgs,
  getOneItemArgs,
  infoSchema,
  jobStatusArgs,
  locationSchema,
  placeDetailsArgs,
  placeQueryArgs,
  primaryWorkflowArgs,
  referenceArgs,
  regionSchema,
  reportViewArgs,
  searchArgs,
  secondaryWorkflowArgs,
  workflowArgs,
} from './schemas.js';
import type {
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
  UploadFileOptions,
} from './types.js';
import { readUploadPart, uploadUrlFor } from './upload.js';

/** Request fields an operation decides; headers, timeout and signal come from the call options. */
type OperationRequest = Omit<DispatchRequest, 'headers' | 'timeout' | 'signal'>;

/**
 * JSON-encodes a query value, skipping it when absent or empty.
 */
function jsonParam(
  name: string,
  value: JsonObject | readonly unknown[] | undefined,
): SafeWrap<ValidationError, string | undefined> {
  if (value === undefined || Object.keys(value).length === 0) {
    return [null, undefined];
  }

  const [err, encoded] = safeWrap(() => JSON.stringify(value));
  if (err) {
    return [new ValidationError(`${name} is not JSON-serialisable`, [], { cause: err }), null];
  }

  return [null, encoded];
}

/**
 * Extracts the document list from a collection response.
 */
function itemsOf(data: unknown): Document[] {
  if (!isRecord(data) || !Array.isArray(data.items)) {
    return [];
  }

  return data.items.filter(isRecord);
}

/**
 * Parses the first entry of a list; the rest of the list is never checked.
 */
function firstEntry<T extends z.ZodTypeAny>(list: unknown, schema: T): z.output<T> | null {
  if (!Array.isArray(list) || list.length === 0) {
    return null;
  }

  const parsed = schema.safeParse(list[0]);
  return parsed.success ? parsed.data : null;
}

/**
 * Create and update answer either with the document or with the document nested
 * under `data`; callers always get the document.
 */
function unwrapDocument(data: unknown): unknown {
  if (isRecord(data) && data.data) {
    return data.data;
  }

  return data;
}

/**
 * Client for the Shipthis REST API.
 *
 * Every operation resolves an error-first tuple and never rejects:
 *
 * ```ts
 * const client = new ShipthisClient({ organisation: 'demo', apiKey: 'test-key' });
 * const [err, invoices] = await client.getList('invoice', { page: 1, count: 20 });
 * if (err) {
 *   // AuthError, RequestError or ValidationError
 * }
 * ```
 *
 * Arguments are checked before anything is sent; a bad collection name or id
 * resolves a `ValidationError` without a request.
 */
export class ShipthisClient {
  /** Dispatcher every operation goes through. */
  #requestClient: RequestClient;
  /** Logger carrying the organisation. */
  #logger: Logger;
  #organisation: string;
  #baseUrl: string;
  #apiKey: string | null;
  #userType: string;
  #regionId: string | null;
  #locationId: string | null;
  #customHeaders: HeaderOptions | undefined;
  /** Organisation metadata from the last successful `connect()`. */
  #organisationInfo: OrganisationInfo | null = null;
  #isConnected = false;

  /**
   * @throws {ValidationError} when the organisation is missing or a setting is malformed.
   */
  constructor({ logger, fetchProvider, customHeaders, ...settings }: ShipthisClientProps) {
    const parsed = clientPropsSchema.safeParse(settings);
    if (!parsed.success) {
      throw new ValidationError('invalid client configuration', parsed.error.issues);
    }

    const { organisation, apiKey, userType, regionId, locationId, timeout, baseUrl } = parsed.data;
    this.#organisation = organisation;
    this.#baseUrl = baseUrl;
    this.#apiKey = apiKey ?? null;
    this.#userType = userType;
    this.#regionId = regionId ?? null;
    this.#locationId = locationId ?? null;
    this.#customHeaders = customHeaders;
    this.#logger = (logger ?? createLogger()).child({ organisation });
    this.#requestClient = new RequestClient({ baseUrl, timeout, fetchProvider, logger: this.#logger });
  }

  get organisation(): string {
    return this.#organisation;
  }

  get baseUrl(): string {
    return this.#baseUrl;
  }

  get userType(): string {
    return this.#userType;
  }

  get regionId(): string | null {
    return this.#regionId;
  }

  get locationId(): string | null {
    return this.#locationId;
  }

  /** Default timeout in milliseconds. */
  get timeout(): number {
    return this.#requestClient.timeout;
  }

  /** Whether an API key is configured. */
  get hasApiKey(): boolean {
    return Boolean(this.#apiKey);
  }

  get isConnected(): boolean {
    return this.#isConnected;
  }

  get organisationInfo(): OrganisationInfo | null {
    return this.#organisationInfo;
  }

  /**
   * Updates settings at runtime; omitted keys keep their value.
   *
   * @throws {ValidationError} when a setting is malformed; nothing is changed then.
   */
  config(settings: ShipthisConfig) {
    const { customHeaders, ...rest } = settings;
    const parsed = clientConfigSchema.safeParse(rest);
    if (!parsed.success) {
      throw new ValidationError('invalid client configuration', parsed.error.issues);
    }

    const { apiKey, userType, regionId, locationId, timeout } = parsed.data;
    if (apiKey !== undefined) {
      this.#apiKey = apiKey;
    }
    if (userType !== undefined) {
      this.#userType = userType;
    }
    if (regionId !== undefined) {
      this.#regionId = regionId;
    }
    if (locationId !== undefined) {
      this.#locationId = locationId;
    }
    if (customHeaders !== undefined) {
      this.#customHeaders = customHeaders;
    }

    this.#requestClient.config({ timeout });
  }

  /**
   * Switches the region and location sent with later requests.
   */
  setRegionLocation(regionId: string, locationId: string) {
    this.#regionId = regionId;
    this.#locationId = locationId;
  }

  /**
   * Aborts every in-flight request; later calls fail with `Request aborted`.
   */
  dispose() {
    this.#requestClient.dispose();
  }

  /**
   * Headers a request made now would carry, with `overrides` applied last.
   */
  headers(overrides?: HeaderOptions): Headers {
    return buildHeaders(
      {
        organisation: this.#organisation,
        userType: this.#userType,
        apiKey: this.#apiKey,
        regionId: this.#regionId,
        locationId: this.#locationId,
        customHeaders: this.#customHeaders,
      },
      overrides,
    );
  }

  /**
   * Fetches user and organisation info for the current credentials.
   */
  async info(opts?: CallOptions): SafeWrapAsync<ShipthisError, unknown> {
    return this.#call({ method: 'GET', path: 'user-auth/info' }, opts);
  }

  /**
   * Validates the credentials and loads the organisation. When region or
   * location is unset, the organisation's first region and its first location
   * are selected.
   */
  async connect(opts?: CallOptions): SafeWrapAsync<ShipthisError, ConnectResult> {
    const [errInfo, info] = await this.info(opts);
    if (errInfo) {
      return [errInfo, null];
    }

    const parsed = infoSchema.safeParse(info);
    if (!parsed.success) {
      return [
        new RequestError('Info response carries no organisation', {
          statusCode: 200,
          details: { response: info },
          cause: new ValidationError('invalid info response', parsed.error.issues),
        }),
        null,
      ];
    }

    const organisation = parsed.data.organisation;
    if (!this.#regionId || !this.#locationId) {
      const region: OrganisationRegion | null = firstEntry(organisation.regions, regionSchema);
      if (region) {
        this.#regionId = region.region_id ?? null;
        const location: OrganisationLocation | null = firstEntry(region.locations, locationSchema);
        if (location) {
          this.#locationId = location.location_id ?? null;
        }
      }
    }

    this.#organisationInfo = organisation;
    this.#isConnected = true;
    this.#logger.info({ regionId: this.#regionId, locationId: this.#locationId }, 'connected');

    return [null, { regionId: this.#regionId, locationId: this.#locationId, organisation }];
  }

  /**
   * Forgets the API key and the connection; nothing is sent.
   */
  disconnect() {
    this.#apiKey = null;
    this.#isConnected = false;
    this.#logger.info('disconnected');
  }

  /**
   * Fetches a document by id, or the first document matching `filters`.
   * Resolves `null` when nothing matches.
   */
  async getOneItem(
    collection: string,
    { id, filters, onlyFields, ...call }: GetOneItemOptions = {},
  ): SafeWrapAsync<ShipthisError, Document | null> {
    const [errArgs] = await this.#check(getOneItemArgs, { collection, id }, 'getOneItem');
    if (errArgs) {
      return [errArgs, null];
    }

    if (id !== undefined) {
      const [err, data] = await this.#call(
        { method: 'GET', path: buildPath('incollection', collection, id), query: { only: onlyFields || undefined } },
        call,
      );
      if (err) {
        return [err, null];
      }

      return [null, isRecord(data) ? data : null];
    }

    const [errFilters, queryFilter] = jsonParam('filters', filters);
    if (errFilters) {
      return [errFilters, null];
    }

    const [err, data] = await this.#call(
      {
        method: 'GET',
        path: buildPath('incollection', collection),
        query: { query_filter_v2: queryFilter, only: onlyFields || undefined },
      },
      call,
    );
    if (err) {
      return [err, null];
    }

    return [null, itemsOf(data)[0] ?? null];
  }

  /**
   * Lists one page of a collection.
   */
  async getList(
    collection: string,
    {
      filters,
      searchQuery,
      page = 1,
      count = 20,
      onlyFields,
      sort,
      outputType,
      meta = true,
      ...call
    }: GetListOptions = {},
  ): SafeWrapAsync<ShipthisError, Document[]> {
    const [errArgs] = await this.#check(getListArgs, { collection, page, count, searchQuery, sort }, 'getList');
    if (errArgs) {
      return [errArgs, null];
    }

    const [errFilters, queryFilter] = jsonParam('filters', filters);
    if (errFilters) {
      return [errFilters, null];
    }

    const [errSort, multiSort] = jsonParam('sort', sort);
    if (errSort) {
      return [errSort, null];
    }

    const [err, data] = await this.#call(
      {
        method: 'GET',
        path: buildPath('incollection', collection),
        query: {
          page,
          count,
          query_filter_v2: queryFilter,
          search_query: searchQuery,
          only: onlyFields || undefined,
          multi_sort: multiSort,
          output_type: outputType || undefined,
          meta: meta ? undefined : 'false',
        },
      },
      call,
    );
    if (err) {
      return [err, null];
    }

    return [null, itemsOf(data)];
  }

  /**
   * Full-text search within a collection.
   */
  async search(
    collection: string,
    query: string,
    { page = 1, count = 20, onlyFields, ...call }: SearchOptions = {},
  ): SafeWrapAsync<ShipthisError, Document[]> {
    const [errArgs] = await this.#check(searchArgs, { collection, query, page, count }, 'search');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.getList(collection, { searchQuery: query, page, count, onlyFields, ...call });
  }

  /**
   * Creates a document, optionally replicated up to 100 times.
   */
  async createItem(
    collection: string,
    data: JsonObject,
    {
      ignoreNewRequired = false,
      skipSequenceIfExists = false,
      replicateCount = 0,
      inputFilters,
      actionOpData,
      ...call
    }: CreateItemOptions = {},
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs, args] = await this.#check(createItemArgs, { collection, replicateCount }, 'createItem');
    if (errArgs) {
      return [errArgs, null];
    }

    const [errFilters, encodedFilters] = jsonParam('inputFilters', inputFilters);
    if (errFilters) {
      return [errFilters, null];
    }

    const body: JsonObject = {
      reqbody: data,
      ignore_new_required: ignoreNewRequired,
      skip_sequence_if_exists: skipSequenceIfExists,
    };
    if (actionOpData && Object.keys(actionOpData).length > 0) {
      body.action_op_data = actionOpData;
    }

    const [err, created] = await this.#call(
      {
        method: 'POST',
        path: buildPath('incollection', collection),
        query: {
          replicate_count: args.replicateCount > 0 ? args.replicateCount : undefined,
          input_filters: encodedFilters,
        },
        body,
      },
      call,
    );
    if (err) {
      return [err, null];
    }

    return [null, unwrapDocument(created)];
  }

  /**
   * Replaces a document's body.
   */
  async updateItem(
    collection: string,
    id: string,
    data: JsonObject,
    opts?: CallOptions,
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(documentArgs, { collection, id }, 'updateItem');
    if (errArgs) {
      return [errArgs, null];
    }

    const [err, updated] = await this.#call(
      { method: 'PUT', path: buildPath('incollection', collection, id), body: { reqbody: data } },
      opts,
    );
    if (err) {
      return [err, null];
    }

    return [null, unwrapDocument(updated)];
  }

  /**
   * Updates individual fields of a document.
   */
  async patchItem(
    collection: string,
    id: string,
    fields: JsonObject,
    opts?: CallOptions,
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(documentArgs, { collection, id }, 'patchItem');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call(
      { method: 'PATCH', path: buildPath('incollection', collection, id), body: { update_fields: fields } },
      opts,
    );
  }

  async deleteItem(collection: string, id: string, opts?: CallOptions): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(documentArgs, { collection, id }, 'deleteItem');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call({ method: 'DELETE', path: buildPath('incollection', collection, id) }, opts);
  }

  /**
   * Creates an entry in a reference-linked field, such as the containers of a shipment.
   */
  async createReferenceLinkedField(
    collection: string,
    id: string,
    payload: JsonObject,
    opts?: CallOptions,
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(documentArgs, { collection, id }, 'createReferenceLinkedField');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call(
      {
        method: 'POST',
        path: buildPath('incollection', 'create-reference-linked-field', collection, id),
        body: payload,
      },
      opts,
    );
  }

  /**
   * Updates the same fields on several documents at once.
   */
  async bulkEdit(
    collection: string,
    ids: string[],
    updateData: JsonObject,
    { externalUpdateData, ...call }: BulkEditOptions = {},
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(bulkEditArgs, { collection, ids }, 'bulkEdit');
    if (errArgs) {
      return [errArgs, null];
    }

    const data: JsonObject = { ids, update_data: updateData };
    if (externalUpdateData && Object.keys(externalUpdateData).length > 0) {
      data.external_update_data = externalUpdateData;
    }

    return this.#call(
      { method: 'POST', path: buildPath('incollection_group_edit', collection), body: { data } },
      call,
    );
  }

  async getJobStatus(collection: string, id: string, opts?: CallOptions): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(documentArgs, { collection, id }, 'getJobStatus');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call({ method: 'GET', path: buildPath('workflow', collection, 'job_status', id) }, opts);
  }

  async setJobStatus(
    collection: string,
    id: string,
    actionIndex: number,
    opts?: CallOptions,
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(jobStatusArgs, { collection, id, actionIndex }, 'setJobStatus');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call(
      {
        method: 'POST',
        path: buildPath('workflow', collection, 'job_status', id),
        body: { action_index: actionIndex },
      },
      opts,
    );
  }

  /**
   * Fetches a workflow definition.
   */
  async getWorkflow(id: string, opts?: CallOptions): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(workflowArgs, { id }, 'getWorkflow');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call({ method: 'GET', path: buildPath('incollection', 'workflow', id) }, opts);
  }

  /**
   * Moves a document through its main status workflow, e.g. a job from
   * `ops_complete` to `closed`.
   */
  async primaryWorkflowAction(
    collection: string,
    workflowId: string,
    id: string,
    actionIndex: number,
    intendedStateId: string,
    { startStateId, ...call }: PrimaryWorkflowActionOptions = {},
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(
      primaryWorkflowArgs,
      { collection, id, workflowId, actionIndex, intendedStateId, startStateId },
      'primaryWorkflowAction',
    );
    if (errArgs) {
      return [errArgs, null];
    }

    const body: JsonObject = { action_index: actionIndex, intended_state_id: intendedStateId };
    if (startStateId !== undefined) {
      body.start_state_id = startStateId;
    }

    return this.#call({ method: 'POST', path: buildPath('workflow', collection, workflowId, id), body }, call);
  }

  /**
   * Moves a document through a sub-workflow, e.g. pickup or delivery status.
   */
  async secondaryWorkflowAction(
    collection: string,
    workflowId: string,
    id: string,
    targetState: string,
    { additionalData, ...call }: SecondaryWorkflowActionOptions = {},
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(
      secondaryWorkflowArgs,
      { collection, id, workflowId, targetState },
      'secondaryWorkflowAction',
    );
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call(
      {
        method: 'POST',
        path: buildPath('workflow', collection, workflowId, id, targetState),
        body: additionalData ?? {},
      },
      call,
    );
  }

  /**
   * Runs a report over a date range, scoped to the current location when one is set.
   */
  async getReportView(
    reportName: string,
    startDate: string | number,
    endDate: string | number,
    { postData, outputType = 'json', skipMeta = true, ...call }: ReportViewOptions = {},
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(reportViewArgs, { reportName, startDate, endDate }, 'getReportView');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call(
      {
        method: 'POST',
        path: buildPath('report-view', reportName),
        query: {
          start_date: startDate,
          end_date: endDate,
          output_type: outputType,
          skip_meta: skipMeta ? 'true' : 'false',
          location: this.#locationId,
        },
        body: postData,
      },
      call,
    );
  }

  /**
   * Looks up the exchange rate from `source` to `target` at a point in time.
   */
  async getExchangeRate(
    source: string,
    { target = 'USD', date = Date.now(), ...call }: ExchangeRateOptions = {},
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(exchangeRateArgs, { source, target, date }, 'getExchangeRate');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call({ method: 'GET', path: 'thirdparty/currency', query: { source, target, date } }, call);
  }

  /**
   * Suggests values for a reference field.
   */
  async autocomplete(reference: string, data: JsonObject, opts?: CallOptions): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(referenceArgs, { reference }, 'autocomplete');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call(
      {
        method: 'POST',
        path: buildPath('autocomplete-reference', reference),
        query: { location: this.#locationId },
        body: data,
      },
      opts,
    );
  }

  async searchLocation(query: string, opts?: CallOptions): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(placeQueryArgs, { query }, 'searchLocation');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call({ method: 'GET', path: 'thirdparty/search-place-autocomplete', query: { query } }, opts);
  }

  /**
   * Resolves a place id returned by `searchLocation`.
   */
  async getPlaceDetails(
    placeId: string,
    { description = '', ...call }: PlaceDetailsOptions = {},
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(placeDetailsArgs, { placeId }, 'getPlaceDetails');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call(
      { method: 'GET', path: 'thirdparty/select-google-place', query: { query: placeId, description } },
      call,
    );
  }

  async createConversation(
    viewName: string,
    documentId: string,
    conversation: ConversationInput,
    opts?: CallOptions,
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(conversationArgs, { viewName, documentId }, 'createConversation');
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call(
      {
        method: 'POST',
        path: 'conversation',
        body: {
          conversation,
          document_id: documentId,
          view_name: viewName,
          message_type: conversation.type ?? '',
        },
      },
      opts,
    );
  }

  async getConversations(
    viewName: string,
    documentId: string,
    { messageType = 'all', page = 1, count = 100, ...call }: ConversationListOptions = {},
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errArgs] = await this.#check(
      conversationListArgs,
      { viewName, documentId, messageType, page, count },
      'getConversations',
    );
    if (errArgs) {
      return [errArgs, null];
    }

    return this.#call(
      {
        method: 'GET',
        path: 'conversation',
        query: {
          view_name: viewName,
          document_id: documentId,
          page,
          count,
          message_type: messageType,
          version: 2,
        },
      },
      call,
    );
  }

  /**
   * Uploads a file, given as a path on disk or a `Blob`, to the upload host.
   * Resolves the upload response, typically `{ url }`.
   */
  async uploadFile(
    file: string | Blob,
    { fileName, headers, timeout, signal }: UploadFileOptions = {},
  ): SafeWrapAsync<ShipthisError, unknown> {
    const [errPart, part] = await readUploadPart(file, fileName);
    if (errPart) {
      return [errPart, null];
    }

    const form = new FormData();
    form.append('file', part.blob, part.name);

    const uploadHeaders = this.headers(headers);
    uploadHeaders.delete('content-type');

    return this.#requestClient.upload({
      url: uploadUrlFor(this.#baseUrl),
      form,
      headers: uploadHeaders,
      timeout,
      signal,
    });
  }

  /**
   * Checks operation arguments before anything is sent.
   */
  #check<T extends StandardSchemaV1>(schema: T, args: unknown, operation: string) {
    return validator(args, schema, `invalid arguments for ${operation}`);
  }

  /**
   * Dispatches a JSON request with the current headers.
   */
  #call(request: OperationRequest, { headers, timeout, signal }: CallOptions = {}) {
    return this.#requestClient.request({ ...request, headers: this.headers(headers), timeout, signal });
  }
}
