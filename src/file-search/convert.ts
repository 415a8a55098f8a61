/**
 * Adapter views to result models. Missing fields get the documented
 * defaults here and nowhere else.
 */

import type { DocumentView, OperationView, StoreView } from "../backend/adapters.js";
import { isJsonObject, normalize } from "../normalize.js";
import { toDocumentState, type Document, type Operation, type Store } from "./model.js";

export function toStore(view: StoreView): Store {
  const active = view.activeDocumentsCount() ?? 0;
  const processing = view.pendingDocumentsCount() ?? 0;
  const failed = view.failedDocumentsCount() ?? 0;
  return {
    name: view.name() ?? "",
    display_name: view.displayName() ?? "",
    counts: { total: active + processing + failed, active, processing, failed },
    size_bytes: view.sizeBytes() ?? 0,
    create_time: view.createTime(),
    update_time: view.updateTime(),
  };
}

export function toDocument(view: DocumentView): Document {
  return {
    name: view.name() ?? "",
    display_name: view.displayName() ?? "",
    state: toDocumentState(view.state()),
    size_bytes: view.sizeBytes(),
    mime_type: view.mimeType(),
    custom_metadata: view.customMetadata() ?? [],
    create_time: view.createTime(),
    update_time: view.updateTime(),
  };
}

export function toOperation(view: OperationView): Operation {
  const operation: Operation = {
    name: view.name() ?? "",
    done: view.done() ?? false,
  };

  const error = view.error();
  if (error) {
    operation.error = {
      code: error.code,
      message: error.message ?? "",
      details: (error.details ?? []).map(normalize),
    };
  }

  const response = normalize(view.response());
  if (isJsonObject(response)) operation.response = response;
  const metadata = normalize(view.metadata());
  if (isJsonObject(metadata)) operation.metadata = metadata;

  const documentName = view.documentName();
  if (documentName) operation.document_name = documentName;
  return operation;
}
