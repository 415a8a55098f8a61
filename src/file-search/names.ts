/**
 * Resource name helpers. Parsing depends on the exact layout:
 *   stores     fileSearchStores/<id>
 *   documents  <store name>/documents/<id>
 */

import { ValidationError } from "../errors.js";

export const DOCUMENT_SEPARATOR = "/documents/";

/**
 * Owning store of a document, found by splitting at the first "/documents/".
 * Throws ValidationError when the name has no separator or an empty side.
 */
export function storeNameFromDocumentName(documentName: string): string {
  const index = documentName.indexOf(DOCUMENT_SEPARATOR);
  if (index <= 0 || index + DOCUMENT_SEPARATOR.length >= documentName.length) {
    throw new ValidationError(
      `Invalid document name "${documentName}": expected <store>${DOCUMENT_SEPARATOR}<document_id>`,
    );
  }
  return documentName.slice(0, index);
}

export function isDocumentOfStore(documentName: string, storeName: string): boolean {
  return documentName.startsWith(`${storeName}${DOCUMENT_SEPARATOR}`);
}

/**
 * Reject empty names and names that would escape the API path.
 */
export function assertResourceName(name: string, what: string): void {
  if (!name.trim()) {
    throw new ValidationError(`${what} must not be empty`);
  }
  if (name.split("/").some((segment) => segment === ".." || segment === ".")) {
    throw new ValidationError(`${what} "${name}" contains a relative path segment`);
  }
}
