import { getLogger } from '@lcforge/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';

import { buildUrl, describeUrl, encodeForm, isTimeoutError } from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import { HttpError, ResponseValidationError, type HttpClientConfig, type HttpRequestOptions } from './types.js';

const DEFAULT_TIMEOUT_MS = 15000;

interface Exchange {
  endpoint: string;
  method: 'GET' | 'POST';
  options: HttpRequestOptions;
  body?: string | undefined;
}

/**
 * Client for the astronomical metadata services. Each call makes exactly one attempt;
 * failures come back as `err` values, never as exceptions.
 */
export class HttpClient {
  private readonly effects: HttpEffects;
  private readonly agent: Agent;
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private closing?: Promise<void>;

  constructor(
    private readonly config: HttpClientConfig,
    effects?: Partial<HttpEffects>
  ) {
    this.headers = { 'User-Agent': 'lcforge/0.1.0', ...config.defaultHeaders };
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.agent = new Agent({ keepAliveTimeout: 10000, keepAliveMaxTimeout: 60000 });

    const logger = getLogger(`http:${config.serviceName}`);
    this.effects = {
      fetch: ((url: string | URL, init?: RequestInit) =>
        undiciFetch(url, { ...init, dispatcher: this.agent })) as typeof fetch,
      log: (level, message, metadata) => logger[level](metadata ?? {}, message),
      now: () => Date.now(),
      ...effects,
    };
  }

  /**
   * GET a body verbatim: XML, VOTable, plain tables.
   */
  async getText(endpoint: string, options: HttpRequestOptions = {}): Promise<Result<string, Error>> {
    const response = await this.exchange({ endpoint, method: 'GET', options });
    if (response.isErr()) {
      return err(response.error);
    }
    return this.readBody(response.value, endpoint, (res) => res.text());
  }

  /**
   * POST `application/x-www-form-urlencoded` and validate the JSON answer.
   */
  async postForm<T>(
    endpoint: string,
    form: Record<string, string>,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: HttpRequestOptions = {}
  ): Promise<Result<T, Error>> {
    const response = await this.exchange({
      body: encodeForm(form),
      endpoint,
      method: 'POST',
      options: {
        ...options,
        headers: {
          Accept: 'application/json',
          ...options.headers,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
      },
    });
    return this.decodeJson(response, schema, endpoint);
  }

  /**
   * Release keep-alive sockets so the process can exit. Safe to call more than once.
   */
  close(): Promise<void> {
    this.closing ??= this.agent.close();
    return this.closing;
  }

  private async exchange({ body, endpoint, method, options }: Exchange): Promise<Result<Response, Error>> {
    const url = buildUrl(this.config.baseUrl, endpoint, options.query);
    const timeout = options.timeout ?? this.timeout;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeout);
    const startedAt = this.effects.now();

    this.effects.log('debug', `${method} ${describeUrl(url)}`);
    try {
      const response = await this.effects.fetch(url, {
        // eslint-disable-next-line unicorn/no-null -- fetch wants null, not undefined, for no body
        body: body ?? null,
        headers: { ...this.headers, ...options.headers },
        method,
        signal: controller.signal,
      });
      this.effects.log('debug', `${method} ${describeUrl(url)} → ${response.status}`, {
        elapsedMs: this.effects.now() - startedAt,
      });

      if (!response.ok) {
        const responseBody = await response.text().catch(() => '');
        return err(new HttpError(this.config.serviceName, response.status, responseBody));
      }
      return ok(response);
    } catch (error) {
      const failure = isTimeoutError(error)
        ? new Error(`${this.config.serviceName} request timed out after ${timeout}ms`)
        : new Error(`${this.config.serviceName} request failed: ${error instanceof Error ? error.message : String(error)}`);
      this.effects.log('warn', failure.message, { url: describeUrl(url) });
      return err(failure);
    } finally {
      clearTimeout(timer);
    }
  }

  private async readBody<T>(
    response: Response,
    endpoint: string,
    read: (response: Response) => Promise<T>
  ): Promise<Result<T, Error>> {
    try {
      return ok(await read(response));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(new Error(`${this.config.serviceName} sent an unreadable body from ${endpoint}: ${reason}`));
    }
  }

  private async decodeJson<T>(
    response: Result<Response, Error>,
    schema: ZodType<T, ZodTypeDef, unknown>,
    endpoint: string
  ): Promise<Result<T, Error>> {
    if (response.isErr()) {
      return err(response.error);
    }
    const payload = await this.readBody(response.value, endpoint, (res): Promise<unknown> => res.json());
    return payload.andThen((value) => this.validate(value, schema, endpoint));
  }

  private validate<T>(payload: unknown, schema: ZodType<T, ZodTypeDef, unknown>, endpoint: string): Result<T, Error> {
    const parsed = schema.safeParse(payload);
    if (parsed.success) {
      return ok(parsed.data);
    }

    const issues = parsed.error.issues.map((issue) => ({ message: issue.message, path: issue.path.join('.') }));
    const excerpt = JSON.stringify(payload)?.slice(0, 500) ?? '';
    const error = new ResponseValidationError(this.config.serviceName, endpoint, issues, excerpt);
    this.effects.log('error', error.message, { excerpt });
    return err(error);
  }
}
