export type QueueErrorCode = "EMPTY_QUEUE" | "NOT_FOUND" | "INCOMPARABLE_KEYS";

export interface QueueErrorParams {
  code: QueueErrorCode;
  detail?: string;
}

/**
 * Every failure raised by this package.
 *
 * `code` is stable and meant for branching; `title` is the human label for the
 * code, `detail` describes the specific occurrence.
 */
export class QueueError extends Error {
  readonly code: QueueErrorCode;
  readonly title: string;
  readonly detail?: string;

  constructor(params: QueueErrorParams) {
    const title = codeToTitle(params.code);
    super(params.detail ? `${title}: ${params.detail}` : title);
    this.name = "QueueError";
    this.code = params.code;
    this.title = title;
    this.detail = params.detail;
  }
}

export function queueError(params: QueueErrorParams): QueueError {
  return new QueueError(params);
}

export function isQueueError(err: unknown, code?: QueueErrorCode): err is QueueError {
  return err instanceof QueueError && (code === undefined || err.code === code);
}

function codeToTitle(code: QueueErrorCode): string {
  switch (code) {
    case "EMPTY_QUEUE":
      return "Empty queue";
    case "NOT_FOUND":
      return "Not found";
    case "INCOMPARABLE_KEYS":
      return "Incomparable keys";
  }
}
