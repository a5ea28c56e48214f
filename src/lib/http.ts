import type { z } from 'zod';
import { ServiceError } from './errors.js';

/**
 * The slice of `fetch` the service clients use; tests pass a fake.
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Send a request and fail with a ServiceError on any non-2xx status
 */
export async function requestOk(
  service: string,
  fetchFn: FetchLike,
  url: string,
  init: RequestInit
): Promise<Response> {
  let response: Response;
  try {
    response = await fetchFn(url, init);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ServiceError(service, null, `${service} request failed: ${reason}`);
  }

  if (!response.ok) {
    const errorBody = await response.text();
    throw new ServiceError(service, response.status, `${service} API error (${response.status}): ${errorBody}`);
  }

  return response;
}

/**
 * Read a JSON body and check it against the expected shape
 */
export async function readJson<T extends z.ZodTypeAny>(
  service: string,
  response: Response,
  schema: T
): Promise<z.infer<T>> {
  const text = await response.text();

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new ServiceError(service, response.status, `${service} returned invalid JSON: ${text.slice(0, 200)}`);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ServiceError(service, response.status, `${service} returned an unexpected reply: ${parsed.error.message}`);
  }
  return parsed.data;
}
