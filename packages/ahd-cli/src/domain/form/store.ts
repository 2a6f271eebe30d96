import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { CorruptFormError } from "../errors.js";
import type { FileField, FormField, TextField, UploadForm } from "../types.js";

export const FORM_DOCUMENT_FORMAT = "ahd-upload-form";
export const FORM_DOCUMENT_VERSION = 1;

/** Placeholder shown in place of torrent bytes by `examine`. */
export const TORRENT_CONTENT_PLACEHOLDER = "<torrent_content>";

type StoredField =
  | { name: string; kind: "text"; value: string }
  | { name: string; kind: "file"; fileName: string; content: string };

interface FormDocument {
  format: typeof FORM_DOCUMENT_FORMAT;
  version: typeof FORM_DOCUMENT_VERSION;
  fields: StoredField[];
}

/** Field name to text value; file fields read as the placeholder. */
export type ExaminedForm = Record<string, string>;

export async function saveUploadForm(form: UploadForm, path: string): Promise<void> {
  const document: FormDocument = {
    format: FORM_DOCUMENT_FORMAT,
    version: FORM_DOCUMENT_VERSION,
    fields: Object.entries(form).map(([name, field]) => toStoredField(name, field)),
  };

  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, "utf8");
}

export async function loadUploadForm(path: string): Promise<UploadForm> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new CorruptFormError(path, "file could not be read", error);
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new CorruptFormError(path, "file is not valid JSON", error);
  }

  if (!isRecord(document) || document.format !== FORM_DOCUMENT_FORMAT) {
    throw new CorruptFormError(path, "file is not an upload form");
  }
  if (document.version !== FORM_DOCUMENT_VERSION) {
    throw new CorruptFormError(path, `unsupported form version ${String(document.version)}`);
  }
  if (!Array.isArray(document.fields)) {
    throw new CorruptFormError(path, "form has no fields");
  }

  const fields: Record<string, FormField> = {};
  document.fields.forEach((entry: unknown, index) => {
    const parsed = parseStoredField(entry);
    if (parsed === undefined) {
      throw new CorruptFormError(path, `field #${index + 1} is malformed`);
    }
    fields[parsed.name] = parsed.field;
  });
  return Object.freeze(fields);
}

export async function deleteUploadForm(path: string): Promise<void> {
  await rm(path);
}

export function examineUploadForm(form: UploadForm): ExaminedForm {
  const examined: ExaminedForm = {};
  for (const [name, field] of Object.entries(form)) {
    examined[name] = field.kind === "text" ? field.value : TORRENT_CONTENT_PLACEHOLDER;
  }
  return examined;
}

function toStoredField(name: string, field: FormField): StoredField {
  if (field.kind === "text") {
    return { name, kind: "text", value: field.value };
  }
  return {
    name,
    kind: "file",
    fileName: field.fileName,
    content: Buffer.from(field.content).toString("base64"),
  };
}

function parseStoredField(entry: unknown): { name: string; field: FormField } | undefined {
  if (!isRecord(entry) || typeof entry.name !== "string" || entry.name.length === 0) {
    return undefined;
  }

  if (entry.kind === "text" && typeof entry.value === "string") {
    const field: TextField = { kind: "text", value: entry.value };
    return { name: entry.name, field: Object.freeze(field) };
  }

  if (
    entry.kind === "file" &&
    typeof entry.fileName === "string" &&
    typeof entry.content === "string" &&
    /^[A-Za-z0-9+/]*={0,2}$/.test(entry.content)
  ) {
    const field: FileField = {
      kind: "file",
      fileName: entry.fileName,
      content: new Uint8Array(Buffer.from(entry.content, "base64")),
    };
    return { name: entry.name, field: Object.freeze(field) };
  }

  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
