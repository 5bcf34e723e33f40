import axios, { AxiosInstance } from 'axios';
import { config } from '../config';

export type HttpMethod = 'GET' | 'POST' | 'PUT';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  params?: Record<string, string>;
  data?: unknown;
}

export interface HttpResponse {
  status: number;
  data: unknown;
}

/**
 * Thin seam over the HTTP client. Any status code resolves; only network
 * failures and timeouts reject.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export class AxiosHttpTransport implements HttpTransport {
  private readonly client: AxiosInstance;

  constructor(timeoutMs: number = config.gateways.timeoutMs) {
    this.client = axios.create({ timeout: timeoutMs });
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.client.request<unknown>({
      method: request.method,
      url: request.url,
      headers: request.headers,
      params: request.params,
      data: request.data,
      validateStatus: () => true
    });
    return { status: response.status, data: response.data };
  }
}
