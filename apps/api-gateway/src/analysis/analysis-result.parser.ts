import {
  ExtractedField,
  ExtractionPayload,
  OperationStage,
  OperationStatus,
  PollingError,
} from '@docsense/processing';

/**
 * Keys a Content Understanding field may carry its value under, in order of
 * preference. Older analyzers use `value`/`content`; current ones use typed keys.
 */
const VALUE_KEYS = [
  'value',
  'valueString',
  'valueNumber',
  'valueInteger',
  'valueDate',
  'valueTime',
  'valueBoolean',
  'valueArray',
  'valueObject',
  'content',
] as const;

const RUNNING_STATUSES = new Set(['notstarted', 'running']);
const FAILED_STATUSES = new Set(['failed', 'cancelled', 'canceled']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps a GET Operation-Location response body to an OperationStatus.
 *
 * @throws PollingError for a body without a recognizable status, which the
 *         poller treats like any other failed status query
 */
export function parseOperationStatus(body: unknown): OperationStatus<ExtractionPayload> {
  if (!isRecord(body) || typeof body.status !== 'string') {
    throw new PollingError('Operation status response has no "status" field');
  }

  const status = body.status.toLowerCase();

  if (RUNNING_STATUSES.has(status)) {
    return { stage: OperationStage.RUNNING };
  }

  if (status === 'succeeded') {
    return { stage: OperationStage.SUCCEEDED, payload: parseExtractionPayload(body) };
  }

  if (FAILED_STATUSES.has(status)) {
    const error = isRecord(body.error) ? body.error : {};
    return {
      stage: OperationStage.FAILED,
      error: {
        code: typeof error.code === 'string' ? error.code : undefined,
        message:
          typeof error.message === 'string' && error.message
            ? error.message
            : `Analysis ${status}`,
      },
    };
  }

  throw new PollingError(`Unknown operation status "${body.status}"`);
}

/**
 * Collects extracted fields from `result.contents[*].fields` (current API)
 * and `analyzeResult.fields` (older API). Null fields and fields without a
 * value are skipped. The whole response body is kept as `rawResult`.
 */
export function parseExtractionPayload(body: Record<string, unknown>): ExtractionPayload {
  const fieldMaps: Record<string, unknown>[] = [];

  if (isRecord(body.result) && Array.isArray(body.result.contents)) {
    for (const content of body.result.contents) {
      if (isRecord(content) && isRecord(content.fields)) {
        fieldMaps.push(content.fields);
      }
    }
  }
  if (isRecord(body.analyzeResult) && isRecord(body.analyzeResult.fields)) {
    fieldMaps.push(body.analyzeResult.fields);
  }

  const fields: ExtractedField[] = [];
  for (const fieldMap of fieldMaps) {
    for (const [name, raw] of Object.entries(fieldMap)) {
      if (!isRecord(raw)) continue;

      const value = fieldValue(raw);
      if (value === undefined) continue;

      fields.push({
        name,
        value,
        confidence: typeof raw.confidence === 'number' ? raw.confidence : null,
      });
    }
  }

  return { fields, rawResult: body };
}

function fieldValue(raw: Record<string, unknown>): unknown {
  for (const key of VALUE_KEYS) {
    const candidate = raw[key];
    if (candidate === undefined || candidate === null || candidate === '') continue;

    if (key === 'valueArray' && Array.isArray(candidate)) {
      return candidate.map((item) => (isRecord(item) ? fieldValue(item) ?? null : item));
    }
    if (key === 'valueObject' && isRecord(candidate)) {
      return Object.fromEntries(
        Object.entries(candidate).map(([k, item]) => [
          k,
          isRecord(item) ? fieldValue(item) ?? null : item,
        ]),
      );
    }
    return candidate;
  }
  return undefined;
}
