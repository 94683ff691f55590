import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FETCH, FetchFn, JSON_MEDIA_TYPE } from './http.constants';
import { PRODUCTION_API_URL } from '../../config/configuration';
import { FilterValue, formatFilterValue } from '../../common/utils/filters';
import { errorMessage } from '../../common/utils/error-details';
import { ApiRequestError, ApiResponseError } from '../../common/errors/ledger.errors';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParams = Readonly<Record<string, FilterValue>>;

interface RequestOptions {
  query?: QueryParams;
  body?: unknown;
}

function normalizedBaseUrl(baseUrl: string): string {
  if (!baseUrl) {
    throw new Error('api.baseUrl is required for ApiClientService');
  }
  return baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
}

/**
 * Thin JSON transport to the accounting API. Resolves with the parsed body
 * (`undefined` for empty responses) and rejects with {@link ApiRequestError}
 * on any non-success status.
 */
@Injectable()
export class ApiClientService {
  private readonly logger = new Logger(ApiClientService.name);
  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly userAgent: string;

  constructor(
    @Inject(FETCH) private readonly fetchImpl: FetchFn,
    private readonly configService: ConfigService,
  ) {
    this.baseUrl = normalizedBaseUrl(
      this.configService.get<string>('api.baseUrl', PRODUCTION_API_URL),
    );
    this.accessToken = this.configService.get<string>('api.accessToken', '');
    this.userAgent = this.configService.get<string>('api.userAgent', 'ledger-client/1.0');
  }

  async get(path: string, query?: QueryParams): Promise<unknown> {
    return this.request('GET', path, { query });
  }

  async post(path: string, body?: unknown, query?: QueryParams): Promise<unknown> {
    return this.request('POST', path, { body, query });
  }

  async put(path: string, body?: unknown): Promise<unknown> {
    return this.request('PUT', path, { body });
  }

  async delete(path: string): Promise<unknown> {
    return this.request('DELETE', path, {});
  }

  buildUrl(path: string, query?: QueryParams): string {
    const absolute =
      path.startsWith('http://') || path.startsWith('https://')
        ? path
        : `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
    const url = new URL(absolute);

    for (const [name, value] of Object.entries(query ?? {})) {
      const formatted = formatFilterValue(value);
      if (formatted !== undefined) {
        url.searchParams.append(name, formatted);
      }
    }

    return url.toString();
  }

  private async request(method: HttpMethod, path: string, options: RequestOptions): Promise<unknown> {
    const url = this.buildUrl(path, options.query);
    const headers: Record<string, string> = {
      Accept: JSON_MEDIA_TYPE,
      Authorization: `Bearer ${this.accessToken}`,
      'User-Agent': this.userAgent,
    };

    let body: string | undefined;
    if (options.body !== undefined) {
      headers['Content-Type'] = JSON_MEDIA_TYPE;
      body = JSON.stringify(options.body);
    }

    const started = Date.now();
    this.logger.debug(`→ ${method} ${url}`);

    const response = await this.fetchImpl(url, { method, headers, body });
    const text = await response.text();

    if (!response.ok) {
      this.logger.error(`← ${method} ${url} ${response.status} - ${Date.now() - started}ms`);
      throw new ApiRequestError(method, url, response.status, response.statusText, text);
    }

    this.logger.debug(`← ${method} ${url} ${response.status} - ${Date.now() - started}ms`);

    if (response.status === 204 || text.trim() === '') {
      return undefined;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ApiResponseError(`Invalid JSON from ${method} ${url}: ${errorMessage(error)}`);
    }
  }
}
