import { fetch, type Dispatcher } from "undici";
import { RepoClientError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";

const logger = createLogger("HttpClient");

export type HttpResponse = {
  statusCode: number;
  body: Buffer;
};

export type HttpResult =
  | { ok: true; response: HttpResponse }
  | { ok: false; error: RepoClientError };

export interface HttpClient {
  get(url: string, headers?: Record<string, string>, timeoutMs?: number): Promise<HttpResult>;
}

export class UndiciHttpClient implements HttpClient {
  constructor(
    private readonly defaultTimeoutMs = 15000,
    private readonly dispatcher?: Dispatcher,
  ) {}

  async get(
    url: string,
    headers: Record<string, string> = {},
    timeoutMs = this.defaultTimeoutMs,
  ): Promise<HttpResult> {
    try {
      const res = await fetch(url, {
        method: "GET",
        headers,
        signal: AbortSignal.timeout(timeoutMs),
        dispatcher: this.dispatcher,
      });
      const body = Buffer.from(await res.arrayBuffer());
      logger.trace("http get", { url, status: res.status, bytes: body.length });
      return { ok: true, response: { statusCode: res.status, body } };
    } catch (error) {
      logger.warn("http request exception", { url, error: errorMessage(error) });
      return {
        ok: false,
        error: new RepoClientError("http_error", `GET ${url} failed: ${errorMessage(error)}`, {
          cause: error,
        }),
      };
    }
  }
}
