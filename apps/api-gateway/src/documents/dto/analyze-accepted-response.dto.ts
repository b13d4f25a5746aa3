/**
 * Response body for POST /documents/analyze/async (HTTP 202 Accepted).
 * Progress is available from GET /documents/:id and its /progress stream.
 */
export class AnalyzeAcceptedResponseDto {
  documentId!: string;

  status!: 'queued';

  message!: string;
}
