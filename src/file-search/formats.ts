/**
 * Advisory list of file formats the file search backend accepts. Nothing in
 * this layer rejects a file for being missing here; the backend decides.
 */

export const SUPPORTED_MIME_TYPES = {
  documents: [
    "application/pdf",
    "application/msword",
    "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
    "application/rtf",
    "application/json",
    "application/xml",
    "application/x-latex",
  ],
  text_and_code: [
    "text/plain",
    "text/markdown",
    "text/html",
    "text/xml",
    "text/yaml",
    "text/css",
    "text/javascript",
    "text/x-python",
    "text/x-java",
    "text/x-c",
    "text/x-c++",
    "text/x-go",
    "text/x-ruby",
    "text/x-php",
    "text/x-rust",
    "text/x-typescript",
    "text/x-shell",
  ],
  spreadsheets: [
    "text/csv",
    "application/vnd.ms-excel",
    "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ],
  presentations: [
    "application/vnd.ms-powerpoint",
    "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  ],
  archives: [
    "application/zip",
    "application/x-tar",
    "application/gzip",
  ],
} as const satisfies Record<string, readonly string[]>;

export type FormatCategory = keyof typeof SUPPORTED_MIME_TYPES;

const EXTENSION_MIME_TYPES: Record<string, string> = {
  ".pdf": "application/pdf",
  ".doc": "application/msword",
  ".docx": "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".rtf": "application/rtf",
  ".json": "application/json",
  ".xml": "application/xml",
  ".tex": "application/x-latex",
  ".txt": "text/plain",
  ".md": "text/markdown",
  ".html": "text/html",
  ".htm": "text/html",
  ".yaml": "text/yaml",
  ".yml": "text/yaml",
  ".css": "text/css",
  ".js": "text/javascript",
  ".py": "text/x-python",
  ".java": "text/x-java",
  ".c": "text/x-c",
  ".h": "text/x-c",
  ".cpp": "text/x-c++",
  ".hpp": "text/x-c++",
  ".go": "text/x-go",
  ".rb": "text/x-ruby",
  ".php": "text/x-php",
  ".rs": "text/x-rust",
  ".ts": "text/x-typescript",
  ".sh": "text/x-shell",
  ".csv": "text/csv",
  ".xls": "application/vnd.ms-excel",
  ".xlsx": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ".ppt": "application/vnd.ms-powerpoint",
  ".pptx": "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  ".zip": "application/zip",
  ".tar": "application/x-tar",
  ".gz": "application/gzip",
};

/** Guess a MIME type from a file name's extension. */
export function inferMimeType(fileName: string | undefined): string | undefined {
  if (!fileName) return undefined;
  const dot = fileName.lastIndexOf(".");
  if (dot < 0) return undefined;
  return EXTENSION_MIME_TYPES[fileName.slice(dot).toLowerCase()];
}

export function isSupportedMimeType(mimeType: string): boolean {
  const normalized = mimeType.split(";")[0].trim().toLowerCase();
  const lists: ReadonlyArray<readonly string[]> = Object.values(SUPPORTED_MIME_TYPES);
  return lists.some((types) => types.includes(normalized));
}
