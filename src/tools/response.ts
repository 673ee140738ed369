/**
 * Shared response shaping for the MCP tools.
 *
 * Every tool answers with one JSON text block. The payload always carries a
 * `success` flag; when it is `false` the block is also flagged `isError`.
 */

import { errorCode, errorMessage } from "../utils/errors.js";

/** Where an operation stopped: a page fetch, the traversal as a whole, or the store. */
export type OperationStage = "fetch" | "extract" | "timeout" | "traversal" | "store";

export interface ErrorDetails {
  code: string;
  message: string;
  stage: OperationStage;
  url?: string;
}

export function errorDetails(error: unknown, stage: OperationStage, url?: string): ErrorDetails {
  return {
    code: errorCode(error),
    message: errorMessage(error),
    stage,
    ...(url === undefined ? {} : { url }),
  };
}

export function toToolResponse<T extends { success: boolean }>(payload: T) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
    ...(payload.success ? {} : { isError: true }),
  };
}
