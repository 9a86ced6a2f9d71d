import axios, {
  AxiosInstance,
  AxiosError,
  InternalAxiosRequestConfig,
} from 'axios';
import { logger } from '../../utils/logger';

export interface ClientConfig {
  baseUrl: string;
  timeout?: number;
  headers?: Record<string, string>;
  maxRetries?: number;
  retryBaseDelayMs?: number;
}

export interface RequestOptions {
  params?: Record<string, string | number>;
  signal?: AbortSignal;
}

interface RetryConfig extends InternalAxiosRequestConfig {
  __retryCount?: number;
}

const RETRYABLE_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND']);

export class HttpClient {
  protected axiosInstance: AxiosInstance;
  protected serviceName: string;
  private maxRetries: number;
  private retryBaseDelayMs: number;

  constructor(config: ClientConfig, serviceName: string = 'http') {
    this.serviceName = serviceName;
    this.maxRetries = config.maxRetries ?? 3;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 1000;

    this.axiosInstance = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout || 30000,
      headers: {
        ...config.headers,
      },
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    // Request interceptor for logging
    this.axiosInstance.interceptors.request.use(
      (config) => {
        logger.debug(
          `[${this.serviceName}] ${config.method?.toUpperCase()} ${config.url}`
        );
        return config;
      },
      (error) => {
        logger.error(`[${this.serviceName}] Request error:`, error);
        return Promise.reject(error);
      }
    );

    // Response interceptor for retry with backoff
    this.axiosInstance.interceptors.response.use(
      (response) => response,
      async (error: AxiosError) => {
        const config: RetryConfig | undefined = error.config;

        if (!config || config.signal?.aborted) {
          return Promise.reject(error);
        }

        config.__retryCount = config.__retryCount || 0;

        if (config.__retryCount >= this.maxRetries) {
          logger.error(
            `[${this.serviceName}] Max retries (${this.maxRetries}) reached for ${config.url}`
          );
          return Promise.reject(error);
        }

        // Only retry on network errors, 429 or 5xx responses
        const status = error.response?.status;
        const shouldRetry =
          (error.code !== undefined && RETRYABLE_CODES.has(error.code)) ||
          status === 429 ||
          (status !== undefined && status >= 500);

        if (!shouldRetry) {
          return Promise.reject(error);
        }

        config.__retryCount += 1;

        // Exponential backoff: 2x, 4x, 8x the base delay
        const delay = Math.pow(2, config.__retryCount) * this.retryBaseDelayMs;

        logger.warn(
          `[${this.serviceName}] Retrying request (${config.__retryCount}/${this.maxRetries}) after ${delay}ms: ${config.url}`
        );

        await new Promise((resolve) => setTimeout(resolve, delay));

        return this.axiosInstance(config);
      }
    );
  }

  /**
   * GET that returns the raw body, for HTML pages.
   */
  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    try {
      const response = await this.axiosInstance.get<string>(url, {
        ...options,
        responseType: 'text',
      });
      return String(response.data ?? '');
    } catch (error) {
      this.handleError(error, 'GET', url);
      throw error;
    }
  }

  private handleError(error: unknown, method: string, url: string): void {
    if (axios.isCancel(error)) {
      logger.debug(`[${this.serviceName}] ${method} ${url} cancelled`);
      return;
    }

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      logger.error(
        `[${this.serviceName}] ${method} ${url} failed with status ${status ?? 'none'}: ${error.message}`
      );
    } else {
      logger.error(
        `[${this.serviceName}] ${method} ${url} failed: ${error}`
      );
    }
  }
}
