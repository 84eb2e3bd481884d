import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, it, type MockedFunction, vi } from 'vitest';
import { AuthError } from '../error/authError.js';
import { RequestError } from '../error/requestError.js';
import type { ShipthisError } from '../error/shipthisError.js';
import { isValidationError, ValidationError } from '../error/validationError.js';
import { isRecord } from '../utils/guards.js';
import type { SafeWrap } from '../utils/wrap.js';
import { ShipthisClient } from './client.js';

const BASE_URL = 'https://api.example.com/api/v3/';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

type ArgumentCase = [
  name: string,
  call: (client: ShipthisClient) => Promise<SafeWrap<ShipthisError, unknown>>,
  message: string,
];

const ok = (data: unknown) => jsonResponse({ success: true, data });

const newClient = (props: Partial<ConstructorParameters<typeof ShipthisClient>[0]> = {}) =>
  new ShipthisClient({ organisation: 'demo', apiKey: 'test-key', baseUrl: BASE_URL, ...props });

/** Parses the JSON body a mocked fetch call was made with. */
function sentBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

/**
 * In-process stand-in for the collection endpoints: POST stores the request
 * body under a generated id, GET by id returns it.
 */
function collectionStore(): typeof fetch {
  const documents = new Map<string, Record<string, unknown>>();
  let nextId = 1;

  return async (input, init) => {
    const url = new URL(String(input));
    const [, , , resource, collection, id] = url.pathname.split('/');
    if (resource !== 'incollection' || !collection) {
      return jsonResponse({ success: false, errors: [{ message: 'Unknown route' }] }, 404);
    }

    if (init?.method === 'POST') {
      const body = sentBody(init);
      const reqbody = isRecord(body) && isRecord(body.reqbody) ? body.reqbody : {};
      const document = { ...reqbody, _id: `doc-${nextId++}` };
      documents.set(`${collection}/${document._id}`, document);
      return ok({ data: document });
    }

    const document = id ? documents.get(`${collection}/${id}`) : undefined;
    if (!document) {
      return jsonResponse({ success: false, errors: [{ message: 'Not found' }] }, 404);
    }

    return ok(document);
  };
}

describe('ShipthisClient', () => {
  let mockedFetch: MockedFunction<typeof fetch>;

  beforeEach(() => {
    mockedFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockedFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('construction', () => {
    it('applies defaults', () => {
      const client = new ShipthisClient({ organisation: 'demo' });

      expect(client.baseUrl).toBe('https://api.shipthis.co/api/v3/');
      expect(client.userType).toBe('employee');
      expect(client.timeout).toBe(30_000);
      expect(client.regionId).toBeNull();
      expect(client.locationId).toBeNull();
      expect(client.hasApiKey).toBe(false);
      expect(client.isConnected).toBe(false);
      expect(client.organisationInfo).toBeNull();
    });

    it('throws a ValidationError without an organisation', () => {
      expect(() => new ShipthisClient({ organisation: '' })).toThrow(ValidationError);
      expect(() => new ShipthisClient({ organisation: '' })).toThrow(
        'invalid client configuration; organisation: is required',
      );
    });

    it('rejects a malformed base URL', () => {
      expect(() => new ShipthisClient({ organisation: 'demo', baseUrl: 'not a url' })).toThrow(
        'invalid client configuration; baseUrl: must be a valid URL',
      );
    });
  });

  describe('headers', () => {
    it('builds the default set', () => {
      const client = newClient({ regionId: 'usa', locationId: 'ny' });
      const headers = client.headers();

      expect(headers.get('organisation')).toBe('demo');
      expect(headers.get('usertype')).toBe('employee');
      expect(headers.get('content-type')).toBe('application/json');
      expect(headers.get('accept')).toBe('application/json');
      expect(headers.get('x-api-key')).toBe('test-key');
      expect(headers.get('region')).toBe('usa');
      expect(headers.get('location')).toBe('ny');
    });

    it('lets per-call overrides beat custom headers, and custom headers beat built-ins', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ items: [] }));
      const client = newClient({ customHeaders: { usertype: 'customer', 'X-Trace': 'custom' } });

      await client.getList('invoice', { headers: { 'x-trace': 'call', Accept: null } });

      const headers = new Headers(mockedFetch.mock.calls[0][1]?.headers);
      expect(headers.get('usertype')).toBe('customer');
      expect(headers.get('x-trace')).toBe('call');
      expect(headers.has('accept')).toBe(false);
      expect(headers.get('organisation')).toBe('demo');
    });

    it('follows runtime configuration', () => {
      const client = newClient();

      client.config({ userType: 'vendor', apiKey: null, timeout: 5_000 });
      client.setRegionLocation('eu', 'ams');

      const headers = client.headers();
      expect(headers.get('usertype')).toBe('vendor');
      expect(headers.has('x-api-key')).toBe(false);
      expect(headers.get('region')).toBe('eu');
      expect(headers.get('location')).toBe('ams');
      expect(client.timeout).toBe(5_000);
    });

    it('leaves the configuration untouched when an update is invalid', () => {
      const client = newClient();

      expect(() => client.config({ userType: 'vendor', timeout: -1 })).toThrow(
        'invalid client configuration; timeout: must be at least 1',
      );
      expect(client.userType).toBe('employee');
      expect(client.timeout).toBe(30_000);
    });
  });

  describe('connect', () => {
    const organisation = {
      name: 'Demo Logistics',
      regions: [
        { region_id: 'usa', locations: [{ location_id: 'ny' }, { location_id: 'la' }] },
        { region_id: 'eu', locations: [{ location_id: 'ams' }] },
      ],
    };

    it('selects the first region and location', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ organisation }));
      mockedFetch.mockResolvedValueOnce(ok({ items: [] }));
      const client = newClient();

      const [err, result] = await client.connect();

      expect(err).toBeNull();
      expect(result).toEqual({ regionId: 'usa', locationId: 'ny', organisation });
      expect(client.isConnected).toBe(true);
      expect(client.organisationInfo).toEqual(organisation);
      expect(mockedFetch.mock.calls[0][0]).toBe('https://api.example.com/api/v3/user-auth/info');

      await client.getList('invoice');
      const headers = new Headers(mockedFetch.mock.calls[1][1]?.headers);
      expect(headers.get('region')).toBe('usa');
      expect(headers.get('location')).toBe('ny');
    });

    it('keeps a configured region and location', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ organisation }));
      const client = newClient({ regionId: 'eu', locationId: 'ams' });

      const [, result] = await client.connect();

      expect(result?.regionId).toBe('eu');
      expect(result?.locationId).toBe('ams');
    });

    it('ignores nulls beyond the first region and location', async () => {
      const sparse = {
        regions: [
          { region_id: 'usa', locations: [{ location_id: 'ny' }, { location_id: null }] },
          { region_id: null, locations: null },
        ],
      };
      mockedFetch.mockResolvedValueOnce(ok({ organisation: sparse }));
      const client = newClient();

      const [err, result] = await client.connect();

      expect(err).toBeNull();
      expect(result).toEqual({ regionId: 'usa', locationId: 'ny', organisation: sparse });
    });

    it('leaves region and location unset when the first region has null ids', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ organisation: { regions: [{ region_id: null, locations: null }] } }));
      const client = newClient();

      const [err, result] = await client.connect();

      expect(err).toBeNull();
      expect(result?.regionId).toBeNull();
      expect(result?.locationId).toBeNull();
      expect(client.isConnected).toBe(true);
    });

    it('leaves the state untouched when info fails', async () => {
      mockedFetch.mockResolvedValueOnce(jsonResponse({ message: 'nope' }, 401));
      const client = newClient();

      const [err, result] = await client.connect();

      expect(err).toBeInstanceOf(AuthError);
      expect(result).toBeNull();
      expect(client.isConnected).toBe(false);
      expect(client.regionId).toBeNull();
      expect(client.organisationInfo).toBeNull();
    });

    it('reports an info payload without an organisation', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ user: 'someone' }));
      const client = newClient();

      const [err] = await client.connect();

      expect(err).toBeInstanceOf(RequestError);
      expect(err?.message).toBe('Info response carries no organisation');
      expect(err?.details).toEqual({ response: { user: 'someone' } });
      expect(client.isConnected).toBe(false);
    });

    it('logs the selected region with the organisation', async () => {
      const lines: Array<Record<string, unknown>> = [];
      const stream = new Writable({
        write(chunk, _encoding, callback) {
          lines.push(JSON.parse(chunk.toString()));
          callback();
        },
      });
      mockedFetch.mockResolvedValueOnce(ok({ organisation }));
      const client = newClient({ logger: pino({ level: 'info' }, stream) });

      await client.connect();

      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({ level: 30, msg: 'connected', organisation: 'demo', regionId: 'usa' });
    });

    it('disconnect drops the API key without a request', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ organisation }));
      const client = newClient();
      await client.connect();

      client.disconnect();

      expect(client.isConnected).toBe(false);
      expect(client.hasApiKey).toBe(false);
      expect(client.headers().has('x-api-key')).toBe(false);
      expect(mockedFetch).toHaveBeenCalledTimes(1);
    });
  });

  describe('collections', () => {
    it('getList resolves the items of a page', async () => {
      mockedFetch.mockResolvedValueOnce(jsonResponse({ success: true, data: { items: [{ _id: '1' }] } }));
      const client = newClient();

      const [err, items] = await client.getList('invoice', { page: 1, count: 20 });

      expect(err).toBeNull();
      expect(items).toEqual([{ _id: '1' }]);
      expect(mockedFetch.mock.calls[0][0]).toBe('https://api.example.com/api/v3/incollection/invoice?page=1&count=20');
      expect(mockedFetch.mock.calls[0][1]?.method).toBe('GET');
    });

    it('getList is repeatable', async () => {
      mockedFetch.mockImplementation(async () => ok({ items: [{ _id: '1' }, { _id: '2' }] }));
      const client = newClient();

      const first = await client.getList('invoice', { page: 2, count: 5 });
      const second = await client.getList('invoice', { page: 2, count: 5 });

      expect(second).toEqual(first);
      expect(mockedFetch.mock.calls[1][0]).toBe(mockedFetch.mock.calls[0][0]);
      expect([...new Headers(mockedFetch.mock.calls[1][1]?.headers)]).toEqual([
        ...new Headers(mockedFetch.mock.calls[0][1]?.headers),
      ]);
    });

    it('getList encodes filters, sort and flags', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ items: [] }));
      const client = newClient();

      await client.getList('sea_shipment', {
        filters: { status: 'open' },
        searchQuery: 'ACME',
        onlyFields: 'name,status',
        sort: [{ field: 'created_at', order: 'desc' }],
        outputType: 'csv',
        meta: false,
      });

      const params = new URL(String(mockedFetch.mock.calls[0][0])).searchParams;
      expect(params.get('page')).toBe('1');
      expect(params.get('count')).toBe('20');
      expect(params.get('query_filter_v2')).toBe('{"status":"open"}');
      expect(params.get('search_query')).toBe('ACME');
      expect(params.get('only')).toBe('name,status');
      expect(params.get('multi_sort')).toBe('[{"field":"created_at","order":"desc"}]');
      expect(params.get('output_type')).toBe('csv');
      expect(params.get('meta')).toBe('false');
    });

    it('getList leaves empty field lists and output types out of the query', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ items: [] }));
      const client = newClient();

      await client.getList('invoice', { onlyFields: '', outputType: '' });

      expect(mockedFetch.mock.calls[0][0]).toBe('https://api.example.com/api/v3/incollection/invoice?page=1&count=20');
    });

    it('getList resolves an empty list when the payload has no items', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ total: 0 }));
      const client = newClient();

      const [err, items] = await client.getList('invoice');

      expect(err).toBeNull();
      expect(items).toEqual([]);
    });

    it('search fixes the search query', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ items: [{ _id: '7' }] }));
      const client = newClient();

      const [, items] = await client.search('customer', 'acme', { count: 5 });

      expect(items).toEqual([{ _id: '7' }]);
      expect(mockedFetch.mock.calls[0][0]).toBe(
        'https://api.example.com/api/v3/incollection/customer?page=1&count=5&search_query=acme',
      );
    });

    it('getOneItem by id', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ _id: 'inv-001', name: 'First' }));
      const client = newClient();

      const [err, item] = await client.getOneItem('invoice', { id: 'inv-001', onlyFields: 'name' });

      expect(err).toBeNull();
      expect(item).toEqual({ _id: 'inv-001', name: 'First' });
      expect(mockedFetch.mock.calls[0][0]).toBe(
        'https://api.example.com/api/v3/incollection/invoice/inv-001?only=name',
      );
    });

    it('getOneItem drops an empty field list', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ _id: 'inv-001' }));
      const client = newClient();

      await client.getOneItem('invoice', { id: 'inv-001', onlyFields: '' });

      expect(mockedFetch.mock.calls[0][0]).toBe('https://api.example.com/api/v3/incollection/invoice/inv-001');
    });

    it('getOneItem without id takes the first match, or null', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ items: [{ _id: 'a1' }, { _id: 'a2' }] }));
      mockedFetch.mockResolvedValueOnce(ok({ items: [] }));
      const client = newClient();

      const [, first] = await client.getOneItem('invoice', { filters: { status: 'open' } });
      const [, none] = await client.getOneItem('invoice');

      expect(first).toEqual({ _id: 'a1' });
      expect(none).toBeNull();
      expect(new URL(String(mockedFetch.mock.calls[0][0])).searchParams.get('query_filter_v2')).toBe(
        '{"status":"open"}',
      );
      expect(mockedFetch.mock.calls[1][0]).toBe('https://api.example.com/api/v3/incollection/invoice');
    });

    it('ids are encoded as a single path segment', async () => {
      mockedFetch.mockResolvedValueOnce(ok(null));
      const client = newClient();

      await client.deleteItem('invoice', '../secret');

      expect(mockedFetch.mock.calls[0][0]).toBe('https://api.example.com/api/v3/incollection/invoice/..%2Fsecret');
      expect(mockedFetch.mock.calls[0][1]?.method).toBe('DELETE');
    });

    it('createItem clamps the replicate count and unwraps the document', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ data: { _id: 'new-1', name: 'Copy' } }));
      const client = newClient();

      const [err, created] = await client.createItem(
        'invoice',
        { name: 'Copy' },
        { replicateCount: 500, actionOpData: { source: 'import' } },
      );

      expect(err).toBeNull();
      expect(created).toEqual({ _id: 'new-1', name: 'Copy' });
      const [url, init] = mockedFetch.mock.calls[0];
      expect(url).toBe('https://api.example.com/api/v3/incollection/invoice?replicate_count=100');
      expect(init?.method).toBe('POST');
      expect(sentBody(init)).toEqual({
        reqbody: { name: 'Copy' },
        ignore_new_required: false,
        skip_sequence_if_exists: false,
        action_op_data: { source: 'import' },
      });
    });

    it('createItem sends no replicate count by default and returns bare payloads as-is', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ _id: 'new-2' }));
      const client = newClient();

      const [, created] = await client.createItem('invoice', { name: 'One' }, { inputFilters: { kind: 'x' } });

      expect(created).toEqual({ _id: 'new-2' });
      expect(mockedFetch.mock.calls[0][0]).toBe(
        `https://api.example.com/api/v3/incollection/invoice?input_filters=${encodeURIComponent('{"kind":"x"}')}`,
      );
    });

    it('create then get returns the submitted fields', async () => {
      mockedFetch.mockImplementation(collectionStore());
      const client = newClient();

      const [errCreate, created] = await client.createItem('customer', { name: 'ACME', city: 'Oslo' });
      expect(errCreate).toBeNull();
      expect(isRecord(created)).toBe(true);
      const id = isRecord(created) && typeof created._id === 'string' ? created._id : '';

      const [errGet, fetched] = await client.getOneItem('customer', { id });

      expect(errGet).toBeNull();
      expect(fetched).toEqual({ name: 'ACME', city: 'Oslo', _id: 'doc-1' });
    });

    it('updateItem wraps the body and unwraps the result', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ data: { _id: 'inv-001', name: 'Renamed' } }));
      const client = newClient();

      const [, updated] = await client.updateItem('invoice', 'inv-001', { name: 'Renamed' });

      expect(updated).toEqual({ _id: 'inv-001', name: 'Renamed' });
      expect(mockedFetch.mock.calls[0][1]?.method).toBe('PUT');
      expect(sentBody(mockedFetch.mock.calls[0][1])).toEqual({ reqbody: { name: 'Renamed' } });
    });

    it('patchItem sends update_fields', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ ok: true }));
      const client = newClient();

      const [, patched] = await client.patchItem('fcl_load', 'load-42', { seal_no: 'SEAL456' });

      expect(patched).toEqual({ ok: true });
      expect(mockedFetch.mock.calls[0][0]).toBe('https://api.example.com/api/v3/incollection/fcl_load/load-42');
      expect(mockedFetch.mock.calls[0][1]?.method).toBe('PATCH');
      expect(sentBody(mockedFetch.mock.calls[0][1])).toEqual({ update_fields: { seal_no: 'SEAL456' } });
    });

    it('bulkEdit nests ids and update data', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ modified: 2 }));
      const client = newClient();

      await client.bulkEdit('customer', ['c-01', 'c-02'], { status: 'active' }, { externalUpdateData: { sync: true } });

      expect(mockedFetch.mock.calls[0][0]).toBe('https://api.example.com/api/v3/incollection_group_edit/customer');
      expect(sentBody(mockedFetch.mock.calls[0][1])).toEqual({
        data: { ids: ['c-01', 'c-02'], update_data: { status: 'active' }, external_update_data: { sync: true } },
      });
    });

    it('createReferenceLinkedField posts the payload', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ _id: 'ref-1' }));
      const client = newClient();

      await client.createReferenceLinkedField('sea_shipment', 'ship-1', { field_name: 'containers', data: {} });

      expect(mockedFetch.mock.calls[0][0]).toBe(
        'https://api.example.com/api/v3/incollection/create-reference-linked-field/sea_shipment/ship-1',
      );
      expect(sentBody(mockedFetch.mock.calls[0][1])).toEqual({ field_name: 'containers', data: {} });
    });
  });

  describe('workflows', () => {
    it('getJobStatus and setJobStatus share a path', async () => {
      mockedFetch.mockImplementation(async () => ok({ status: 'done' }));
      const client = newClient();

      await client.getJobStatus('sea_shipment', 'job-1');
      await client.setJobStatus('sea_shipment', 'job-1', 2);

      expect(mockedFetch.mock.calls[0][0]).toBe(
        'https://api.example.com/api/v3/workflow/sea_shipment/job_status/job-1',
      );
      expect(mockedFetch.mock.calls[1][0]).toBe(mockedFetch.mock.calls[0][0]);
      expect(sentBody(mockedFetch.mock.calls[1][1])).toEqual({ action_index: 2 });
    });

    it('getWorkflow', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ states: [] }));
      const client = newClient();

      const [, workflow] = await client.getWorkflow('wf-job');

      expect(workflow).toEqual({ states: [] });
      expect(mockedFetch.mock.calls[0][0]).toBe('https://api.example.com/api/v3/incollection/workflow/wf-job');
    });

    it('primaryWorkflowAction', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ state: 'closed' }));
      const client = newClient();

      await client.primaryWorkflowAction('pickup_delivery', 'job_status', 'pd-1', 0, 'closed', {
        startStateId: 'ops_complete',
      });

      expect(mockedFetch.mock.calls[0][0]).toBe(
        'https://api.example.com/api/v3/workflow/pickup_delivery/job_status/pd-1',
      );
      expect(sentBody(mockedFetch.mock.calls[0][1])).toEqual({
        action_index: 0,
        intended_state_id: 'closed',
        start_state_id: 'ops_complete',
      });
    });

    it('secondaryWorkflowAction sends an empty object without extra data', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ state: 'delivered' }));
      const client = newClient();

      await client.secondaryWorkflowAction('pickup_delivery', 'delivery_status', 'pd-1', 'delivered');

      expect(mockedFetch.mock.calls[0][0]).toBe(
        'https://api.example.com/api/v3/workflow/pickup_delivery/delivery_status/pd-1/delivered',
      );
      expect(sentBody(mockedFetch.mock.calls[0][1])).toEqual({});
    });
  });

  describe('reports and lookups', () => {
    it('getReportView scopes to the current location', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ rows: [] }));
      const client = newClient({ locationId: 'ny' });

      await client.getReportView('invoice_summary', '2024-01-01', '2024-01-31', { postData: { currency: 'USD' } });

      expect(mockedFetch.mock.calls[0][0]).toBe(
        'https://api.example.com/api/v3/report-view/invoice_summary?start_date=2024-01-01&end_date=2024-01-31&output_type=json&skip_meta=true&location=ny',
      );
      expect(mockedFetch.mock.calls[0][1]?.method).toBe('POST');
      expect(sentBody(mockedFetch.mock.calls[0][1])).toEqual({ currency: 'USD' });
    });

    it('getExchangeRate defaults to USD and now', async () => {
      vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
      mockedFetch.mockResolvedValueOnce(ok({ rate: 1.1 }));
      const client = newClient();

      const [, rate] = await client.getExchangeRate('EUR');

      expect(rate).toEqual({ rate: 1.1 });
      expect(mockedFetch.mock.calls[0][0]).toBe(
        'https://api.example.com/api/v3/thirdparty/currency?source=EUR&target=USD&date=1700000000000',
      );
    });

    it('autocomplete sends the location when set', async () => {
      mockedFetch.mockResolvedValueOnce(ok([{ label: 'ACME' }]));
      const client = newClient({ locationId: 'ny' });

      await client.autocomplete('customer', { search: 'ac' });

      expect(mockedFetch.mock.calls[0][0]).toBe(
        'https://api.example.com/api/v3/autocomplete-reference/customer?location=ny',
      );
      expect(sentBody(mockedFetch.mock.calls[0][1])).toEqual({ search: 'ac' });
    });

    it('searchLocation and getPlaceDetails', async () => {
      mockedFetch.mockImplementation(async () => ok([]));
      const client = newClient();

      await client.searchLocation('Oslo');
      await client.getPlaceDetails('place-1', { description: 'Oslo, Norway' });

      expect(mockedFetch.mock.calls[0][0]).toBe(
        'https://api.example.com/api/v3/thirdparty/search-place-autocomplete?query=Oslo',
      );
      expect(mockedFetch.mock.calls[1][0]).toBe(
        'https://api.example.com/api/v3/thirdparty/select-google-place?query=place-1&description=Oslo%2C+Norway',
      );
    });
  });

  describe('conversations', () => {
    it('createConversation takes the message type from the conversation', async () => {
      mockedFetch.mockResolvedValueOnce(ok({ _id: 'msg-1' }));
      const client = newClient();

      await client.createConversation('sea_shipment', 'ship-1', { type: 'key', message: 'Hello' });

      expect(sentBody(mockedFetch.mock.calls[0][1])).toEqual({
        conversation: { type: 'key', message: 'Hello' },
        document_id: 'ship-1',
        view_name: 'sea_shipment',
        message_type: 'key',
      });
    });

    it('getConversations asks for version 2', async () => {
      mockedFetch.mockResolvedValueOnce(ok([]));
      const client = newClient();

      await client.getConversations('sea_shipment', 'ship-1');

      expect(mockedFetch.mock.calls[0][0]).toBe(
        'https://api.example.com/api/v3/conversation?view_name=sea_shipment&document_id=ship-1&page=1&count=100&message_type=all&version=2',
      );
    });
  });

  describe('errors', () => {
    it('maps 401 to an AuthError', async () => {
      mockedFetch.mockResolvedValueOnce(jsonResponse({ message: 'bad key' }, 401));
      const client = newClient();

      const [err, items] = await client.getList('invoice');

      expect(items).toBeNull();
      expect(err).toBeInstanceOf(AuthError);
      expect(err?.message).toBe('Authentication failed. Check your API key.');
      expect(err?.statusCode).toBe(401);
    });

    it('reports the first envelope error', async () => {
      mockedFetch.mockResolvedValueOnce(jsonResponse({ success: false, errors: [{ message: 'Invalid collection' }] }));
      const client = newClient();

      const [err] = await client.getList('invoice');

      expect(err).toBeInstanceOf(RequestError);
      expect(err?.message).toBe('Invalid collection');
      expect(err?.statusCode).toBe(200);
    });

    it('reports a body that is not JSON', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('<html>maintenance</html>', { status: 200 }));
      const client = newClient();

      const [err] = await client.getList('invoice');

      expect(err).toBeInstanceOf(RequestError);
      expect(err?.message).toBe('Invalid JSON response: <html>maintenance</html>');
    });
  });

  describe('argument checks', () => {
    it.each<ArgumentCase>([
      [
        'short collection',
        (client) => client.getList('ab'),
        'invalid arguments for getList; collection: must be at least 3 characters',
      ],
      [
        'collection with a space',
        (client) => client.getList('in voice'),
        'invalid arguments for getList; collection: may only contain letters, digits, "_" and "-"',
      ],
      [
        'page zero',
        (client) => client.getList('invoice', { page: 0 }),
        'invalid arguments for getList; page: must be at least 1',
      ],
      [
        'short id',
        (client) => client.deleteItem('invoice', 'x'),
        'invalid arguments for deleteItem; id: must be at least 3 characters',
      ],
      [
        'blank search',
        (client) => client.search('invoice', '   '),
        'invalid arguments for search; query: cannot be empty',
      ],
      [
        'negative replicate count',
        (client) => client.createItem('invoice', {}, { replicateCount: -1 }),
        'invalid arguments for createItem; replicateCount: must not be negative',
      ],
      [
        'no ids',
        (client) => client.bulkEdit('invoice', [], {}),
        'invalid arguments for bulkEdit; ids: must list at least one id',
      ],
      [
        'fractional action index',
        (client) => client.setJobStatus('invoice', 'job-1', 1.5),
        'invalid arguments for setJobStatus; actionIndex: must be an integer',
      ],
    ])('%s is rejected without a request', async (_name, call, message) => {
      const client = newClient();

      const [err, data] = await call(client);

      expect(data).toBeNull();
      expect(isValidationError(err)).toBe(true);
      expect(err?.message).toBe(message);
      expect(mockedFetch).not.toHaveBeenCalled();
    });
  });

  describe('uploadFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'shipthis-upload-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('posts a file from disk to the upload host', async () => {
      const path = join(dir, 'invoice.pdf');
      await writeFile(path, 'pdf-bytes');
      mockedFetch.mockResolvedValueOnce(jsonResponse({ url: 'https://files.example.com/invoice.pdf' }));
      const client = newClient();

      const [err, uploaded] = await client.uploadFile(path);

      expect(err).toBeNull();
      expect(uploaded).toEqual({ url: 'https://files.example.com/invoice.pdf' });
      const [url, init] = mockedFetch.mock.calls[0];
      expect(url).toBe('https://upload.example.com/api/v3/file-upload');
      expect(init?.method).toBe('POST');
      const headers = new Headers(init?.headers);
      expect(headers.has('content-type')).toBe(false);
      expect(headers.get('x-api-key')).toBe('test-key');
      const body = init?.body;
      expect(body).toBeInstanceOf(FormData);
      const entry = body instanceof FormData ? body.get('file') : null;
      expect(entry).toBeInstanceOf(File);
      if (entry instanceof File) {
        expect(entry.name).toBe('invoice.pdf');
        expect(await entry.text()).toBe('pdf-bytes');
      }
    });

    it('names a bare blob "upload"', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('https://files.example.com/upload', { status: 200 }));
      const client = newClient();

      const [, uploaded] = await client.uploadFile(new Blob(['hello']));

      expect(uploaded).toEqual({ url: 'https://files.example.com/upload' });
      const body = mockedFetch.mock.calls[0][1]?.body;
      const entry = body instanceof FormData ? body.get('file') : null;
      expect(entry instanceof File ? entry.name : null).toBe('upload');
    });

    it('reports a missing file without a request', async () => {
      const path = join(dir, 'missing.pdf');
      const client = newClient();

      const [err] = await client.uploadFile(path);

      expect(err).toBeInstanceOf(RequestError);
      expect(err?.message).toBe(`File not found: ${path}`);
      expect(err?.statusCode).toBe(0);
      expect(mockedFetch).not.toHaveBeenCalled();
    });

    it('reports a failed upload', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('too large', { status: 413 }));
      const client = newClient();

      const [err] = await client.uploadFile(new Blob(['hello']), { fileName: 'big.bin' });

      expect(err).toBeInstanceOf(RequestError);
      expect(err?.message).toBe('Upload failed with status 413');
      expect(err?.statusCode).toBe(413);
    });
  });

  it('dispose aborts later calls', async () => {
    const client = newClient();
    client.dispose();

    const [err] = await client.getList('invoice');

    expect(err).toBeInstanceOf(RequestError);
    expect(err?.message).toBe('Request aborted: client was disposed');
    expect(mockedFetch).not.toHaveBeenCalled();
  });
});
