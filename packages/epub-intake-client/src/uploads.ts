import { InvalidRequestError } from './errors.js';
import type { IntakeHttpClient } from './client.js';
import type { AuthenticatedRequestOptions, UploadParams, UploadResult } from './types.js';

const UPLOAD_FIELD = 'epub';

export class UploadsResource {
  constructor(private readonly client: IntakeHttpClient) {}

  async create(params: UploadParams, options?: AuthenticatedRequestOptions): Promise<UploadResult> {
    if (!params.filename.toLowerCase().endsWith('.epub')) {
      throw new InvalidRequestError('File must be an EPUB', 'INVALID_EXTENSION');
    }

    const blob = params.file instanceof Blob ? params.file : new Blob([params.file]);
    const form = new FormData();
    form.append(UPLOAD_FIELD, blob, params.filename);

    return this.client.request<UploadResult>({
      method: 'POST',
      path: '/upload',
      auth: 'apiKey',
      body: form,
      options,
    });
  }
}
