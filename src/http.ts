import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';

export type QueryParams = Record<string, string | number | undefined>;

export interface HttpGetter {
  get(url: string, params?: QueryParams): Promise<unknown>;
}

export type HttpClientOptions = {
  // 0 leaves axios without a timeout
  timeoutMs: number;
  adapter?: AxiosAdapter;
};

export class HttpClient implements HttpGetter {
  private client: AxiosInstance;

  constructor(options: HttpClientOptions) {
    this.client = axios.create({
      timeout: options.timeoutMs,
      adapter: options.adapter,
      headers: {
        'User-Agent': 'steam-stats-tracker/1.0',
        Accept: 'application/json',
      },
    });
  }

  async get(url: string, params?: QueryParams): Promise<unknown> {
    const response = await this.client.get<unknown>(url, { params });
    return response.data;
  }
}
