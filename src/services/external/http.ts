export type QueryParams = Record<string, string | number | boolean | null | undefined>;

export class HttpError extends Error {
  readonly status: number;

  constructor(service: string, status: number, statusText: string, body: string) {
    super(`${service} HTTP ${status} ${statusText}${body ? `: ${body.slice(0, 200)}` : ''}`);
    this.name = 'HttpError';
    this.status = status;
  }
}

export function buildUrl(baseUrl: string, pathname: string, query?: QueryParams): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}/${pathname.replace(/^\/+/, '')}`);
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined && value !== null && value !== '') {
        url.searchParams.set(key, String(value));
      }
    }
  }
  return url.toString();
}

/**
 * GET a JSON document. Resolves to null on 404; other failures throw.
 */
export async function getJson(
  service: string,
  url: string,
  headers: Record<string, string> = {}
): Promise<unknown> {
  const response = await fetch(url, {
    headers: { accept: 'application/json', ...headers },
  });

  if (response.status === 404) {
    return null;
  }

  if (!response.ok) {
    const text = await response.text();
    throw new HttpError(service, response.status, response.statusText, text);
  }

  return response.json();
}
