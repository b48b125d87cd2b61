import { IntakeHttpClient } from './client.js';
import { UploadsResource } from './uploads.js';
import type { EpubIntakeConfig, HealthStatus, RequestOptions } from './types.js';

export class EpubIntake {
  public readonly uploads: UploadsResource;
  private readonly client: IntakeHttpClient;

  constructor(config: EpubIntakeConfig = {}) {
    this.client = new IntakeHttpClient(config);
    this.uploads = new UploadsResource(this.client);
  }

  setApiKey(apiKey: string): void {
    this.client.setApiKey(apiKey);
  }

  health(options?: RequestOptions): Promise<HealthStatus> {
    return this.client.request<HealthStatus>({
      method: 'GET',
      path: '/health',
      auth: 'public',
      options,
    });
  }
}

export * from './types.js';
export * from './errors.js';
