/**
 * HTTP utilities for the catalog service with retry and timeout handling
 */

export interface CatalogCallOptions {
  base: string;
  path: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  retries: number;
}

export interface CatalogResponse {
  json: unknown;
  status: number;
  latency: number;
}

/**
 * GET a catalog resource; each attempt gets its own timeout, failures back off linearly
 */
export async function callCatalog(opts: CatalogCallOptions): Promise<CatalogResponse> {
  const url = `${opts.base.replace(/\/+$/, "")}${opts.path}`;

  let lastErr: unknown;

  for (let i = 0; i <= opts.retries; i++) {
    const t0 = Date.now();

    try {
      const res = await fetch(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          ...(opts.headers || {})
        },
        signal: AbortSignal.timeout(opts.timeoutMs)
      });
      const latency = Date.now() - t0;
      const text = await res.text();

      if (!res.ok) {
        throw new Error(`Catalog request failed: ${res.status} ${text.slice(0, 200)}`);
      }

      return { json: parseBody(text, res.status), status: res.status, latency };
    } catch (e) {
      lastErr = e;

      if (i < opts.retries) {
        await new Promise(r => setTimeout(r, 300 * (i + 1)));
      }
    }
  }

  throw lastErr;
}

function parseBody(text: string, status: number): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Catalog returned a non-JSON body: ${status} ${text.slice(0, 200)}`);
  }
}
