/** Response body for POST /documents/:id/cancel (HTTP 202 Accepted). */
export class CancelDocumentResponseDto {
  documentId!: string;

  /** false when the task had already finished */
  cancelled!: boolean;
}
