import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';

export interface ApiClientOptions {
  name: string;
  baseURL: string;
  timeout: number;
  userAgent: string;
  // Replaces the HTTP layer; tests pass an in-process stub here
  adapter?: AxiosAdapter;
}

export interface TextResponse {
  status: number;
  statusText: string;
  body: string;
}

/**
 * Plain-text GET client for the upstream REST services.
 *
 * Every HTTP status is returned to the caller: a 404 from BridgeDB or PubChem is
 * an ordinary outcome the resolver branches on. Only failures without a
 * response (DNS, refused connection, timeout) are thrown.
 */
export class UpstreamApiClient {
  readonly name: string;
  private client: AxiosInstance;

  constructor(options: ApiClientOptions) {
    this.name = options.name;
    this.client = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeout,
      responseType: 'text',
      validateStatus: () => true,
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/plain',
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        if (axios.isAxiosError(error) && error.request) {
          // The request was made but no response was received
          throw new Error(`No response received from ${this.name}: ${error.message}`);
        }
        throw new Error(`Request setup error: ${error instanceof Error ? error.message : String(error)}`);
      }
    );
  }

  async getText(path: string): Promise<TextResponse> {
    const response = await this.client.get<unknown>(path);
    return {
      status: response.status,
      statusText: response.statusText ?? '',
      body: typeof response.data === 'string' ? response.data : '',
    };
  }
}
