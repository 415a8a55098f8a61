/**
 * Operation polling and the advisory format list.
 */

import type { FileSearchBackend } from "../backend/types.js";
import { toOperation } from "./convert.js";
import { SUPPORTED_MIME_TYPES } from "./formats.js";
import { operationPhase, type Operation, type OperationPhase } from "./model.js";
import { assertResourceName } from "./names.js";

export interface OperationStatus extends Operation {
  phase: OperationPhase;
}

/** Ingestion is not awaited anywhere; callers poll this until done. */
export async function getOperationStatus(backend: FileSearchBackend, name: string): Promise<OperationStatus> {
  assertResourceName(name, "operation_name");
  const operation = toOperation(await backend.getOperation(name));
  return { ...operation, phase: operationPhase(operation) };
}

export interface SupportedFormats {
  supported_mime_types: typeof SUPPORTED_MIME_TYPES;
  note: string;
}

export function listSupportedFormats(): SupportedFormats {
  return {
    supported_mime_types: SUPPORTED_MIME_TYPES,
    note: "Advisory only. Uploads are not rejected locally for an unlisted type.",
  };
}
