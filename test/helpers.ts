import { type Mock, vi } from "vitest";
import type { BulkPayload, FetchLike } from "../src/index.js";

export function reply(
  status: number,
  body = "",
  headers?: Record<string, string>,
): Response {
  return new Response(body, { status, headers });
}

/** Fetch stand-in answering by request path; unknown paths get 404 */
export function routeFetch(routes: Record<string, number>) {
  return vi.fn<FetchLike>(async (input) => {
    const { pathname } = new URL(input);
    return reply(routes[pathname] ?? 404, `status for ${pathname}`);
  });
}

export function postedPaths(fetchMock: Mock<FetchLike>): string[] {
  return fetchMock.mock.calls.map(([input]) => new URL(input).pathname);
}

export function postedBodies(fetchMock: Mock<FetchLike>): BulkPayload[] {
  return fetchMock.mock.calls.map(([, init]) => JSON.parse(String(init.body)));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
