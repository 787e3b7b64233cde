import { BadGatewayException } from '@nestjs/common';

export const PIPELINE_ERROR_KINDS = [
  'NotAuthenticated',
  'RefreshFailed',
  'UpstreamError',
  'AIServiceError',
  'UnparsableResponse',
  'NoHistory',
  'ListAPIError',
  'NoRecommendations',
  'Unknown',
] as const;

export type PipelineErrorKind = (typeof PIPELINE_ERROR_KINDS)[number];

/** A failure of one pipeline stage, tagged with the kind the caller reports. */
export class PipelineError extends Error {
  constructor(
    readonly kind: PipelineErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

export function isPipelineError(
  err: unknown,
  ...kinds: PipelineErrorKind[]
): err is PipelineError {
  if (!(err instanceof PipelineError)) return false;
  return kinds.length === 0 || kinds.includes(err.kind);
}

export function errToMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

export function classifyError(err: unknown): PipelineErrorKind {
  if (err instanceof PipelineError) return err.kind;
  if (err instanceof BadGatewayException) return 'UpstreamError';
  return 'Unknown';
}
