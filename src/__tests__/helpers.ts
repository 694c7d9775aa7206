/**
 * Shared test utilities: configuration for a fake listing site and an
 * in-process fetch that serves canned pages by URL
 */
import { loadEnvironmentConfig, type EnvironmentConfig } from '../config/environment';

export const TEST_ORIGIN = 'https://www.example.gov';
export const TEST_LISTING_URL = `${TEST_ORIGIN}/briefings-statements/`;

export type Route = string | (() => Response | Promise<Response>);

export const createMockResponse = (body: string, status = 200, statusText = 'OK') =>
  new Response(body, { status, statusText });

export const notFound = () => createMockResponse('<html><body>Not Found</body></html>', 404, 'Not Found');

export function createTestConfig(env: Record<string, string> = {}): EnvironmentConfig {
  return loadEnvironmentConfig({
    LISTING_URL: TEST_LISTING_URL,
    OUTPUT_FILE: 'test-feed.xml',
    LISTING_FETCH_RETRIES: '0',
    RETRY_MIN_TIMEOUT_MS: '0',
    LOG_LEVEL: 'error',
    ...env
  });
}

/** Serves each URL from its route; anything unrouted answers 404. */
export function createRoutedFetch(routes: Record<string, Route>) {
  return jest.fn(async (input: string, _init?: RequestInit): Promise<Response> => {
    const route = routes[input];
    if (route === undefined) {
      return notFound();
    }
    return typeof route === 'string' ? createMockResponse(route) : route();
  });
}

export const article = (path: string) => `${TEST_ORIGIN}/briefings-statements/${path}`;
