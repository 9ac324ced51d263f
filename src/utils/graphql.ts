import { LINEAR_API_URL, REQUEST_TIMEOUT_MS } from '../constants.js';
import { TransportError, getErrorMessage } from './errors.js';

export interface GraphQLOptions {
  apiKey: string;
  url?: string;
  timeoutMs?: number;
}

/**
 * POST a GraphQL document and return its `data` member, unvalidated.
 * Non-2xx statuses, an `errors` array, timeouts and network failures all
 * surface as TransportError.
 */
export async function runGraphQL(
  query: string,
  variables: Record<string, unknown> | undefined,
  options: GraphQLOptions,
): Promise<unknown> {
  const body = JSON.stringify({
    query,
    variables: variables ?? {},
  });

  let response: Response;
  try {
    response = await fetch(options.url ?? LINEAR_API_URL, {
      method: 'POST',
      headers: {
        Authorization: options.apiKey,
        'Content-Type': 'application/json',
      },
      body,
      signal: AbortSignal.timeout(options.timeoutMs ?? REQUEST_TIMEOUT_MS),
    });
  } catch (err) {
    throw new TransportError(`Linear API request failed: ${getErrorMessage(err)}`, { cause: err });
  }

  if (!response.ok) {
    const text = await response.text().catch(() => '');
    throw new TransportError(`Linear API request failed: ${response.status} - ${text}`, {
      status: response.status,
    });
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (err) {
    throw new TransportError('Failed to parse Linear API response', { cause: err, status: response.status });
  }

  if (typeof payload !== 'object' || payload === null) {
    throw new TransportError('Linear API returned an empty response', { status: response.status });
  }

  if ('errors' in payload && Array.isArray(payload.errors) && payload.errors.length > 0) {
    const messages = payload.errors.map((e: unknown) =>
      typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string'
        ? e.message
        : JSON.stringify(e),
    );
    throw new TransportError(`Linear API error: ${messages.join(', ')}`, {
      status: response.status,
      context: { errors: payload.errors },
    });
  }

  return 'data' in payload ? payload.data : undefined;
}
