export interface HttpRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchFn = (url: string, init?: HttpRequestInit) => Promise<HttpResponse>;

export const defaultFetch: FetchFn = (url, init) => fetch(url, init);

export function joinUrl(baseUrl: string, path: string): string {
  return baseUrl.replace(/\/+$/, "") + path;
}

export function uniqueSorted(values: string[]): string[] {
  return Array.from(new Set(values)).sort();
}
