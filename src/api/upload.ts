import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { RequestError } from '../error/requestError.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Name given to a `Blob` that carries none. */
export const DEFAULT_UPLOAD_NAME = 'upload';

/** A file ready to go into a multipart form. */
export interface UploadPart {
  blob: Blob;
  name: string;
}

/**
 * Derives the upload endpoint from the API base URL: the `api.` host becomes
 * `upload.` and the path ends in `/api/v3/file-upload`.
 *
 * @example
 * uploadUrlFor('https://api.shipthis.co/api/v3/') // 'https://upload.shipthis.co/api/v3/file-upload'
 */
export function uploadUrlFor(baseUrl: string): string {
  const url = new URL(baseUrl);
  if (url.hostname.startsWith('api.')) {
    url.hostname = `upload.${url.hostname.slice('api.'.length)}`;
  }

  const prefix = url.pathname.replace(/\/api\/v3\/?$/, '').replace(/\/+$/, '');
  url.pathname = `${prefix}/api/v3/file-upload`;
  url.search = '';
  url.hash = '';

  return url.toString();
}

/**
 * Resolves the content and name of an upload. Paths are read from disk;
 * blobs are used as they are.
 */
export async function readUploadPart(file: string | Blob, fileName?: string): SafeWrapAsync<RequestError, UploadPart> {
  if (typeof file !== 'string') {
    const ownName = file instanceof File ? file.name : '';
    return [null, { blob: file, name: fileName ?? (ownName || DEFAULT_UPLOAD_NAME) }];
  }

  const [err, content] = await safeWrapAsync(() => readFile(file));
  if (err) {
    return [new RequestError(`File not found: ${file}`, { cause: err }), null];
  }

  return [null, { blob: new Blob([new Uint8Array(content)]), name: fileName ?? basename(file) }];
}
