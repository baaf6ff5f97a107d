import { DEFAULT_FILENAME } from './constants';
import { JsonObject, JsonValue, isJsonObject, stringField } from './json';
import { DocumentRef, SignatureRecord } from './types';

// A document without an id is kept with an empty id; the run logs it as an error.
function parseDocumentRef(value: JsonValue): DocumentRef {
  const fields: JsonObject = isJsonObject(value) ? value : {};
  const id = stringField(fields.id) ?? '';
  const file = fields.file;
  const declared = isJsonObject(file) ? stringField(file.name) : undefined;
  return { id, originalName: declared || (id ? `${id}.pdf` : DEFAULT_FILENAME) };
}

/** Returns undefined when the record lacks an id. */
export function parseSignatureRecord(value: JsonValue): SignatureRecord | undefined {
  if (!isJsonObject(value)) return undefined;
  const id = stringField(value.id);
  if (!id) return undefined;

  const rawDocuments = Array.isArray(value.documents) ? value.documents : [];
  const documents = rawDocuments.map(parseDocumentRef);

  return {
    id,
    createdAt: stringField(value.created_at) ?? '',
    documents,
    summary: value,
  };
}
