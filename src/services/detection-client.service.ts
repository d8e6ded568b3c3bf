/**
 * Detection Client
 * Sends a floor plan image to the external detection service and returns its raw result
 */

import axios, { AxiosInstance } from 'axios';
import { appConfig } from '../config/app.config';
import { FILE_UPLOAD } from '../utils/constants';
import { DetectionServiceError, getErrorMessage } from '../utils/errors';
import { loggers } from '../utils/logger';

export interface DetectionClientOptions {
  url?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export class DetectionClient {
  private readonly url: string;
  private readonly http: AxiosInstance;

  constructor(options: DetectionClientOptions = {}) {
    this.url = options.url ?? appConfig.detector.url;
    this.http = options.http ?? axios.create({
      timeout: options.timeoutMs ?? appConfig.detector.timeoutMs
    });
  }

  /**
   * Run detection on an image. The payload is returned unvalidated;
   * the generation pipeline validates it at its own boundary.
   */
  async detect(image: Buffer, filename: string, mimeType: string): Promise<unknown> {
    const startTime = Date.now();
    const formData = new FormData();
    formData.append(FILE_UPLOAD.FIELD_NAME, new Blob([new Uint8Array(image)], { type: mimeType }), filename);

    loggers.detection.info(`Requesting detection for ${filename}`, {
      url: this.url,
      bytes: image.byteLength,
      mimeType
    });

    try {
      const response = await this.http.post<unknown>(this.url, formData);
      loggers.performance.measure('Detection request', startTime);

      if (typeof response.data !== 'object' || response.data === null) {
        throw new DetectionServiceError('Detection service returned a non-JSON body', {
          status: response.status
        });
      }

      return response.data;
    } catch (error) {
      if (error instanceof DetectionServiceError) throw error;

      const details = axios.isAxiosError(error)
        ? { status: error.response?.status, code: error.code, body: error.response?.data }
        : undefined;

      loggers.detection.error('Detection request failed', { url: this.url, ...details, message: getErrorMessage(error) });
      throw new DetectionServiceError(`Detection service request failed: ${getErrorMessage(error)}`, details);
    }
  }
}

// Export singleton
export const detectionClient = new DetectionClient();
