import {
  AuthenticationError,
  EpubIntakeError,
  InvalidRequestError,
  MethodNotAllowedError,
  ServerError,
} from './errors.js';
import type { AuthenticatedRequestOptions, EpubIntakeConfig, ErrorResponse } from './types.js';

const DEFAULT_BASE_URL = 'http://localhost:8080';
const USER_AGENT = 'epub-intake-client/0.1.0';
const API_KEY_PARAM = 'api_key';

type AuthMode = 'public' | 'apiKey';

interface RequestConfig {
  auth: AuthMode;
  path: '/upload' | '/health';
  method: 'GET' | 'POST';
  body?: FormData;
  options?: AuthenticatedRequestOptions;
}

// The service answers JSON; a proxy in front of it may answer plain text.
function readBody(raw: string): unknown {
  if (!raw) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function errorDetails(status: number, payload: unknown): ErrorResponse['error'] {
  if (typeof payload === 'string') return { code: 'UNKNOWN', message: payload };
  if (payload && typeof payload === 'object' && 'error' in payload) {
    const { error } = payload;
    if (
      error &&
      typeof error === 'object' &&
      'code' in error &&
      'message' in error &&
      typeof error.code === 'string' &&
      typeof error.message === 'string'
    ) {
      return { code: error.code, message: error.message };
    }
  }
  return { code: 'UNKNOWN', message: `Upload service request failed with status ${status}` };
}

export class IntakeHttpClient {
  private readonly baseUrl: string;
  private apiKey?: string;

  constructor(config: EpubIntakeConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.apiKey = config.apiKey;
  }

  setApiKey(apiKey: string): void {
    this.apiKey = apiKey;
  }

  async request<T>(config: RequestConfig): Promise<T> {
    const url = new URL(`${this.baseUrl}${config.path}`);
    if (config.auth === 'apiKey') {
      url.searchParams.set(API_KEY_PARAM, this.resolveApiKey(config.options?.apiKey));
    }

    const response = await fetch(url.toString(), {
      method: config.method,
      headers: {
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      },
      body: config.body,
      signal: config.options?.signal,
    });

    const payload = readBody(await response.text());
    if (!response.ok) {
      throw this.toApiError(response.status, payload);
    }

    return payload as T;
  }

  private resolveApiKey(overrideKey?: string): string {
    const key = overrideKey ?? this.apiKey;
    if (!key) {
      throw new AuthenticationError('Missing API key');
    }
    return key;
  }

  private toApiError(status: number, payload: unknown): EpubIntakeError {
    const { code, message } = errorDetails(status, payload);

    if (status === 400) return new InvalidRequestError(message, code, payload);
    if (status === 401) return new AuthenticationError(message, payload);
    if (status === 405) return new MethodNotAllowedError(message, payload);
    if (status >= 500) return new ServerError(message, code, status, payload);

    return new EpubIntakeError(message, code, status, payload);
  }
}
