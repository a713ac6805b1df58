export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export const globalFetch: FetchLike = (url, init) => fetch(url, init);

export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}
