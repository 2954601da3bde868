export interface HttpResponse {
  status: number;
  text: string;
  headers: Record<string, string>;
}

export interface HttpRequest {
  url: string;
  method: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface HttpClient {
  request(params: HttpRequest): Promise<HttpResponse>;
}

/**
 * HttpClient backed by Node's native fetch.
 * Every request is bounded by a timeout; tests substitute an in-process implementation.
 * Header names in the response are lower-cased.
 */
export class FetchHttpClient implements HttpClient {
  private timeoutMs: number;

  constructor(timeoutMs: number) {
    this.timeoutMs = timeoutMs;
  }

  async request(params: HttpRequest): Promise<HttpResponse> {
    const resp = await fetch(params.url, {
      method: params.method,
      headers: params.headers,
      body: params.body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const text = await resp.text();
    const headers: Record<string, string> = {};
    resp.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return { status: resp.status, text, headers };
  }
}
