export interface EpubIntakeConfig {
  baseUrl?: string;
  apiKey?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface AuthenticatedRequestOptions extends RequestOptions {
  apiKey?: string;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
  };
}

export interface UploadParams {
  file: Blob | Uint8Array;
  /** Sent as the part's filename; must end in `.epub`. */
  filename: string;
}

export interface UploadResult {
  status: 'success';
  /** Stored name, `YYYYMMDD_HHMMSS_<original basename>`. */
  filename: string;
  size: number;
}

export interface HealthStatus {
  status: 'healthy';
}
