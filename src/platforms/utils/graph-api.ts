import { Platform, PostErrorKind, PostFailure } from '../../common/interfaces';
import { PlatformPostError } from '../../common/errors';
import { getErrorMessage } from '../../common/utils/error.utils';

/**
 * Error payload returned by the Graph API
 */
export interface GraphApiErrorPayload {
  message?: string;
  type?: string;
  code?: number;
  error_subcode?: number;
  fbtrace_id?: string;
}

export interface GraphRequest {
  method: 'GET' | 'POST';
  url: string;
  accessToken: string;
  params?: Record<string, string | undefined>;
  timeoutMs: number;
}

export type GraphResponseBody = Record<string, unknown>;

const RATE_LIMIT_CODES = new Set([4, 17, 32, 613]);
const AUTH_CODES = new Set([10, 102, 190]);
const MEDIA_CODES = new Set([324, 9004]);
const TRANSIENT_CODES = new Set([1, 2]);

/**
 * Maps an HTTP status and Graph error code to a post error kind
 */
export function classifyGraphError(
  status: number,
  code?: number,
  subcode?: number,
): PostErrorKind {
  if (
    status === 429 ||
    (code !== undefined &&
      (RATE_LIMIT_CODES.has(code) || (code >= 80001 && code <= 80014)))
  ) {
    return PostErrorKind.RATE_LIMITED;
  }

  if (
    status === 401 ||
    (code !== undefined &&
      (AUTH_CODES.has(code) || (code >= 200 && code <= 299)))
  ) {
    return PostErrorKind.AUTH_INVALID;
  }

  if (
    (code !== undefined &&
      (MEDIA_CODES.has(code) || (code >= 36000 && code <= 36003))) ||
    (subcode !== undefined && subcode >= 2207000 && subcode < 2208000)
  ) {
    return PostErrorKind.MEDIA_REJECTED;
  }

  if (status >= 500 || (code !== undefined && TRANSIENT_CODES.has(code))) {
    return PostErrorKind.TRANSIENT_NETWORK;
  }

  return PostErrorKind.UNKNOWN;
}

/**
 * Classifies anything thrown around a platform call
 */
export function toPlatformPostError(error: unknown): PlatformPostError {
  if (error instanceof PlatformPostError) {
    return error;
  }

  if (
    error instanceof Error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  ) {
    return new PlatformPostError(
      PostErrorKind.TRANSIENT_NETWORK,
      error.name === 'TimeoutError'
        ? 'Request timed out'
        : getErrorMessage(error),
      { cause: error },
    );
  }

  return new PlatformPostError(PostErrorKind.UNKNOWN, getErrorMessage(error), {
    cause: error,
  });
}

export function failedPost(platform: Platform, error: unknown): PostFailure {
  const classified = toPlatformPostError(error);
  return {
    platform,
    success: false,
    errorKind: classified.kind,
    error: classified.message,
  };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

export function readString(
  body: GraphResponseBody,
  key: string,
): string | undefined {
  const value = body[key];
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  return typeof value === 'number' ? String(value) : undefined;
}

function readErrorPayload(body: unknown): GraphApiErrorPayload | undefined {
  const error = isRecord(body) ? body.error : undefined;
  if (!isRecord(error)) {
    return undefined;
  }
  const { message, type, code, error_subcode, fbtrace_id } = error;
  return {
    message: typeof message === 'string' ? message : undefined,
    type: typeof type === 'string' ? type : undefined,
    code: typeof code === 'number' ? code : undefined,
    error_subcode:
      typeof error_subcode === 'number' ? error_subcode : undefined,
    fbtrace_id: typeof fbtrace_id === 'string' ? fbtrace_id : undefined,
  };
}

/**
 * Performs one Graph API call with a bounded timeout.
 * Throws a classified PlatformPostError on any failure.
 */
export async function callGraphApi(
  request: GraphRequest,
): Promise<GraphResponseBody> {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(request.params ?? {})) {
    if (value !== undefined) {
      params.append(key, value);
    }
  }
  params.append('access_token', request.accessToken);

  let response: Response;
  try {
    response =
      request.method === 'GET'
        ? await fetch(`${request.url}?${params.toString()}`, {
            signal: AbortSignal.timeout(request.timeoutMs),
          })
        : await fetch(request.url, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/x-www-form-urlencoded',
            },
            body: params.toString(),
            signal: AbortSignal.timeout(request.timeoutMs),
          });
  } catch (error) {
    // fetch only rejects when no response arrived
    const classified = toPlatformPostError(error);
    throw classified.kind === PostErrorKind.UNKNOWN
      ? new PlatformPostError(
          PostErrorKind.TRANSIENT_NETWORK,
          getErrorMessage(error),
          { cause: error },
        )
      : classified;
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    if (response.ok) {
      throw new PlatformPostError(
        PostErrorKind.UNKNOWN,
        'Graph API returned a non-JSON response',
        { status: response.status, cause: error },
      );
    }
    body = undefined;
  }

  if (!response.ok) {
    const payload = readErrorPayload(body);
    throw new PlatformPostError(
      classifyGraphError(
        response.status,
        payload?.code,
        payload?.error_subcode,
      ),
      payload?.message ?? `Graph API request failed with HTTP ${response.status}`,
      {
        status: response.status,
        code: payload?.code,
        subcode: payload?.error_subcode,
      },
    );
  }

  if (!isRecord(body)) {
    throw new PlatformPostError(
      PostErrorKind.UNKNOWN,
      'Graph API returned an unexpected response body',
      { status: response.status },
    );
  }

  return body;
}
