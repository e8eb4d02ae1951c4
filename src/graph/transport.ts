import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { createLogger } from '../utils/logger.js';
import { toGraphApiError } from '../utils/error-handler.js';
import { TokenProvider } from '../auth/token-provider.js';

const logger = createLogger('graph-transport');

/**
 * The HTTP boundary of the sync. URLs are absolute; failures are thrown as
 * GraphApiError (or a subclass).
 */
export interface GraphTransport {
  get(url: string): Promise<unknown>;
  post(url: string, body: unknown): Promise<unknown>;
  patch(url: string, body: unknown): Promise<void>;
  delete(url: string): Promise<void>;
}

export interface AxiosGraphTransportConfig {
  tokenProvider: TokenProvider;
  timeoutMs?: number;
  /** Extra axios settings, e.g. a custom adapter */
  axiosConfig?: AxiosRequestConfig;
}

export class AxiosGraphTransport implements GraphTransport {
  private readonly axiosInstance: AxiosInstance;

  constructor(config: AxiosGraphTransportConfig) {
    this.axiosInstance = axios.create({
      ...config.axiosConfig,
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
      timeout: config.timeoutMs ?? 30000,
    });

    this.axiosInstance.interceptors.request.use(async (request) => {
      const token = await config.tokenProvider.getToken();
      request.headers.set('Authorization', `Bearer ${token}`);
      return request;
    });
  }

  private async send<T>(method: string, url: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const graphError = toGraphApiError(error, { method, url });
      logger.debug('Graph request failed', { method, url, status: graphError.statusCode, error: graphError.message });
      throw graphError;
    }
  }

  async get(url: string): Promise<unknown> {
    return this.send('GET', url, async () => (await this.axiosInstance.get<unknown>(url)).data);
  }

  async post(url: string, body: unknown): Promise<unknown> {
    return this.send('POST', url, async () => (await this.axiosInstance.post<unknown>(url, body)).data);
  }

  async patch(url: string, body: unknown): Promise<void> {
    await this.send('PATCH', url, () => this.axiosInstance.patch(url, body));
  }

  async delete(url: string): Promise<void> {
    await this.send('DELETE', url, () => this.axiosInstance.delete(url));
  }
}
