import fetch from 'node-fetch';

export type ClientOptions = { baseUrl: string; apiKey?: string };

export type PageSize = { height: number; width: number };

export type PageToAltoResult = { altoXml: string; skippedLines: string[] };

export type LayoutSummary = {
  id: string;
  size: PageSize;
  regions: Array<{ id: string; lines: number }>;
};

export class LayoutClientError extends Error {
  constructor(readonly status: number, readonly body: string) {
    super(`Request failed with status ${status}: ${body}`);
    this.name = 'LayoutClientError';
  }
}

export class LayoutClient {
  constructor(private opts: ClientOptions) {}

  private headers() {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.opts.apiKey) h['authorization'] = `Bearer ${this.opts.apiKey}`;
    return h;
  }

  private url(route: string) {
    return `${this.opts.baseUrl.replace(/\/+$/, '')}${route}`;
  }

  private async request<T>(route: string, body?: unknown): Promise<T> {
    const r = body === undefined
      ? await fetch(this.url(route), { headers: this.headers() })
      : await fetch(this.url(route), { method: 'POST', headers: this.headers(), body: JSON.stringify(body) });
    if (!r.ok) throw new LayoutClientError(r.status, await r.text());
    const data: T = await r.json();
    return data;
  }

  async health() {
    return this.request<{ ok: boolean }>('/health');
  }

  /** `logits` is the snapshot bytes; they travel base64-encoded. */
  async pageToAlto(pageXml: string, logits: Uint8Array) {
    return this.request<PageToAltoResult>('/convert/page-to-alto', {
      pageXml,
      logits: Buffer.from(logits).toString('base64'),
    });
  }

  async altoToPage(altoXml: string) {
    return this.request<{ pageXml: string }>('/convert/alto-to-page', { altoXml });
  }

  async summary(pageXml: string) {
    return this.request<LayoutSummary>('/layout/summary', { pageXml });
  }
}
