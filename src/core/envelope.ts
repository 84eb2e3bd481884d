import { z } from 'zod';
import { AuthError } from '../error/authError.js';
import { RequestError } from '../error/requestError.js';
import type { ShipthisError } from '../error/shipthisError.js';
import { isRecord } from '../utils/guards.js';
import { excerpt, parseJson, tryParse } from '../utils/tryParse.js';
import type { SafeWrap } from '../utils/wrap.js';

/**
 * Wrapper every endpoint answers with, `{ success, data?, errors?, message? }`.
 * Unknown keys are kept so they can be attached to errors as details.
 * Only a body that is not an object fails to parse; `null` or mistyped fields
 * read as absent, so `success` alone decides.
 */
export const envelopeSchema = z
  .object({
    success: z.boolean().nullish().catch(undefined),
    data: z.unknown().optional(),
    errors: z.array(z.unknown()).nullish().catch(undefined),
    message: z.string().nullish().catch(undefined),
  })
  .passthrough();

export type ResponseEnvelope = z.infer<typeof envelopeSchema>;

const errorEntrySchema = z.object({ message: z.string().optional() }).passthrough();

/** Statuses whose envelope decides between data and error. */
const SUCCESS_STATUSES = new Set([200, 201]);

/**
 * Maps 401 and 403 to an {@link AuthError}; `null` for every other status.
 */
export function authErrorFor(status: number): AuthError | null {
  if (status === 401) {
    return new AuthError('Authentication failed. Check your API key.', { statusCode: 401 });
  }

  if (status === 403) {
    return new AuthError('Access denied. Check your permissions.', { statusCode: 403 });
  }

  return null;
}

/**
 * Picks the message reported for a failed envelope: the first error's
 * message, then the envelope's own message, then a generic fallback.
 */
export function envelopeErrorMessage(envelope: ResponseEnvelope): string {
  const [first] = envelope.errors ?? [];
  if (first !== undefined) {
    const entry = errorEntrySchema.safeParse(first);
    return (entry.success && entry.data.message) || 'Unknown error';
  }

  return envelope.message || 'API call failed';
}

/**
 * Classifies a received response from its status and raw body text.
 *
 * - 401/403 give an {@link AuthError}.
 * - An empty body on a 2xx status resolves to `null`.
 * - A body that is not JSON gives a {@link RequestError} quoting the start of it.
 * - 200/201 resolve the envelope's `data` when `success` is `true`, and give a
 *   {@link RequestError} carrying the envelope otherwise.
 * - Any other status gives a {@link RequestError} with the parsed body as details.
 */
export function classifyResponse(status: number, text: string): SafeWrap<ShipthisError, unknown> {
  const authError = authErrorFor(status);
  if (authError) {
    return [authError, null];
  }

  if (!text && status >= 200 && status < 300) {
    return [null, null];
  }

  const [errJson, body] = parseJson(text);
  if (errJson) {
    return [
      new RequestError(`Invalid JSON response: ${excerpt(text)}`, { statusCode: status, cause: errJson }),
      null,
    ];
  }

  if (!SUCCESS_STATUSES.has(status)) {
    return [
      new RequestError(`Request failed with status ${status}`, {
        statusCode: status,
        details: isRecord(body) ? body : { response: body },
      }),
      null,
    ];
  }

  const envelope = envelopeSchema.safeParse(body);
  if (!envelope.success) {
    return [
      new RequestError('API call failed', { statusCode: status, details: { response: body } }),
      null,
    ];
  }

  if (envelope.data.success === true) {
    return [null, envelope.data.data ?? null];
  }

  return [
    new RequestError(envelopeErrorMessage(envelope.data), { statusCode: status, details: envelope.data }),
    null,
  ];
}

/**
 * Classifies an upload response. Uploads answer with a bare body rather than
 * an envelope: JSON when available, otherwise the text is taken as the file URL.
 */
export function classifyUploadResponse(status: number, text: string): SafeWrap<ShipthisError, unknown> {
  const authError = authErrorFor(status);
  if (authError) {
    return [authError, null];
  }

  if (status !== 200) {
    return [
      new RequestError(`Upload failed with status ${status}`, {
        statusCode: status,
        details: { response: tryParse(text) },
      }),
      null,
    ];
  }

  const [errJson, body] = parseJson(text);
  if (errJson) {
    return [null, { url: text }];
  }

  return [null, body];
}
