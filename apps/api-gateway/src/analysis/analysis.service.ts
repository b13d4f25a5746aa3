import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AnalysisClient,
  ExtractionPayload,
  OperationStatus,
  PollingError,
  SubmissionError,
} from '@docsense/processing';
import { parseOperationStatus } from './analysis-result.parser';

const DEFAULT_API_VERSION = '2025-05-01-preview';
const DEFAULT_ANALYZER_ID = 'prebuilt-documentAnalyzer';
const SUBSCRIPTION_KEY_HEADER = 'Ocp-Apim-Subscription-Key';

/**
 * AnalysisService — client for the Content Understanding REST API.
 *
 * Responsibilities:
 *   1. Start an analyze operation for a document URL (POST …:analyze → 2xx, normally 202)
 *   2. Return the Operation-Location header as the operation handle
 *   3. Query the operation and map its status to an OperationStatus
 *
 * submit() failures are SubmissionError. Status query failures are
 * PollingError; the poller decides whether to retry them.
 */
@Injectable()
export class AnalysisService implements AnalysisClient {
  private readonly logger = new Logger(AnalysisService.name);
  private readonly endpoint: string;
  private readonly apiKey: string;
  private readonly apiVersion: string;
  private readonly analyzerId: string;

  constructor(private readonly configService: ConfigService) {
    this.endpoint = this.configService
      .get<string>('CONTENT_UNDERSTANDING_ENDPOINT', '')
      .replace(/\/+$/, '');
    this.apiKey = this.configService.get<string>('CONTENT_UNDERSTANDING_KEY', '');
    this.apiVersion = this.configService.get<string>(
      'CONTENT_UNDERSTANDING_API_VERSION',
      DEFAULT_API_VERSION,
    );
    this.analyzerId = this.configService.get<string>(
      'CONTENT_UNDERSTANDING_ANALYZER_ID',
      DEFAULT_ANALYZER_ID,
    );
  }

  async submit(documentUrl: string): Promise<string> {
    if (!this.endpoint || !this.apiKey) {
      throw new SubmissionError(
        'Content Understanding is not configured (CONTENT_UNDERSTANDING_ENDPOINT / CONTENT_UNDERSTANDING_KEY)',
      );
    }

    const url =
      `${this.endpoint}/contentunderstanding/analyzers/` +
      `${encodeURIComponent(this.analyzerId)}:analyze?api-version=${encodeURIComponent(this.apiVersion)}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          [SUBSCRIPTION_KEY_HEADER]: this.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ inputs: [{ url: documentUrl }] }),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SubmissionError(`Analyze request failed: ${message}`, { cause: error });
    }

    if (!response.ok) {
      const detail = await this.readErrorDetail(response);
      throw new SubmissionError(
        `Analyze request rejected with HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
      );
    }

    const operationLocation = response.headers.get('Operation-Location');
    if (!operationLocation) {
      throw new SubmissionError('Analyze response has no Operation-Location header');
    }

    this.logger.debug(`Analyze operation started: ${operationLocation}`);
    return operationLocation;
  }

  async fetchStatus(
    operationHandle: string,
    signal?: AbortSignal,
  ): Promise<OperationStatus<ExtractionPayload>> {
    let response: Response;
    try {
      response = await fetch(operationHandle, {
        method: 'GET',
        headers: { [SUBSCRIPTION_KEY_HEADER]: this.apiKey },
        signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new PollingError(`Status request failed: ${message}`, { cause: error });
    }

    if (!response.ok) {
      const detail = await this.readErrorDetail(response);
      throw new PollingError(
        `Status request returned HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new PollingError('Status response is not valid JSON', { cause: error });
    }

    return parseOperationStatus(body);
  }

  // ── Helpers ────────────────────────────────────────────────

  private async readErrorDetail(response: Response): Promise<string> {
    try {
      return (await response.text()).slice(0, 500);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Could not read error body: ${message}`);
      return '';
    }
  }
}
