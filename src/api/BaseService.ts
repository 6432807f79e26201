import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';

export interface ApiError {
  error: string;
  code: number;
}

/**
 * Error raised for any failed HTTP call to a remote collaborator.
 */
export class RemoteServiceError extends Error {
  constructor(
    message: string,
    public readonly code: number | string
  ) {
    super(message);
    this.name = 'RemoteServiceError';
  }
}

export class BaseService {
  protected axios: AxiosInstance;

  constructor(baseURL: string, config?: AxiosRequestConfig) {
    this.axios = axios.create({ baseURL, ...config });
  }

  protected async request<T>(config: AxiosRequestConfig): Promise<T> {
    try {
      const response = await this.axios.request<T>(config);
      return response.data;
    } catch (err) {
      if (!axios.isAxiosError<ApiError>(err)) {
        throw err;
      }
      const message = err.response?.data?.error || err.message;
      const code = err.response?.data?.code || err.code || err.response?.status || 500;
      throw new RemoteServiceError(message, code);
    }
  }
}
