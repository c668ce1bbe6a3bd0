/**
 * Document Store Types
 *
 * The document-management backend the pipeline reads OCR text from and
 * writes reconciled metadata back to.
 */

import type { FieldValue } from '../merge';

export interface NamedEntity {
  id: number;
  name: string;
}

export interface CustomFieldDefinition extends NamedEntity {
  dataType: string | null;
}

/**
 * Point-in-time view of a document, custom fields keyed by field name.
 */
export interface DocumentSnapshot {
  id: number;
  title: string;
  content: string;
  /** `YYYY-MM-DD` */
  created: string | null;
  added: string | null;
  modified: string | null;
  originalFileName: string | null;
  correspondentId: number | null;
  correspondentName: string | null;
  documentTypeId: number | null;
  documentTypeName: string | null;
  tagIds: number[];
  tagNames: string[];
  customFields: Record<string, FieldValue>;
  /** Custom field name to id, for the fields present on the document */
  customFieldIds: Record<string, number>;
}

export interface DocumentPatch {
  title?: string;
  correspondentId?: number;
  documentTypeId?: number;
  tagsAdd: number[];
  tagsRemove: number[];
  /** Custom field id to value */
  customFields: Map<number, FieldValue>;
}

export interface PatchPayload {
  title?: string;
  correspondent?: number;
  document_type?: number;
  tags?: number[];
  custom_fields?: Array<{ field: number; value: FieldValue }>;
}

/**
 * Operations the pipeline and review queue need from the store.
 */
export interface DocumentStore {
  getDocumentSnapshot(docId: number): Promise<DocumentSnapshot>;
  getDocumentsByTag(tagName: string): Promise<number[]>;
  getDocumentsByCorrespondent(correspondentName: string): Promise<number[]>;
  /** Custom fields in the patch replace or extend the document's current ones */
  patchDocument(docId: number, patch: DocumentPatch, current: DocumentSnapshot): Promise<void>;
  getTagByName(name: string): Promise<NamedEntity | null>;
  addTagToDocument(docId: number, tagName: string): Promise<void>;
  removeTagFromDocument(docId: number, tagName: string): Promise<void>;
  getCustomFieldByName(name: string): Promise<CustomFieldDefinition | null>;
  getCorrespondentByName(name: string): Promise<NamedEntity | null>;
  getDocumentTypeByName(name: string): Promise<NamedEntity | null>;
}

export function emptyPatch(): DocumentPatch {
  return { tagsAdd: [], tagsRemove: [], customFields: new Map() };
}

/**
 * The document's current custom field values keyed by field id.
 */
export function currentCustomFieldValues(snapshot: DocumentSnapshot): Map<number, FieldValue> {
  const values = new Map<number, FieldValue>();
  for (const [name, id] of Object.entries(snapshot.customFieldIds)) {
    values.set(id, Object.hasOwn(snapshot.customFields, name) ? snapshot.customFields[name] : null);
  }
  return values;
}

export function isEmptyPatch(patch: DocumentPatch): boolean {
  return (
    patch.title === undefined &&
    patch.correspondentId === undefined &&
    patch.documentTypeId === undefined &&
    patch.tagsAdd.length === 0 &&
    patch.tagsRemove.length === 0 &&
    patch.customFields.size === 0
  );
}

export function hasTag(snapshot: DocumentSnapshot, tagName: string): boolean {
  const lowered = tagName.toLowerCase();
  return snapshot.tagNames.some((name) => name.toLowerCase() === lowered);
}

/**
 * Request body for a patch. Tags are sent as the full resulting set and
 * custom fields as the full resulting list, since the store replaces both.
 *
 * @param currentCustomFields - the document's current custom fields by id
 */
export function toPatchPayload(
  patch: DocumentPatch,
  currentTagIds: readonly number[],
  currentCustomFields: ReadonlyMap<number, FieldValue> = new Map()
): PatchPayload {
  const payload: PatchPayload = {};

  if (patch.title !== undefined) {
    payload.title = patch.title;
  }
  if (patch.correspondentId !== undefined) {
    payload.correspondent = patch.correspondentId;
  }
  if (patch.documentTypeId !== undefined) {
    payload.document_type = patch.documentTypeId;
  }

  if (patch.tagsAdd.length > 0 || patch.tagsRemove.length > 0) {
    const tags = new Set(currentTagIds);
    patch.tagsAdd.forEach((id) => tags.add(id));
    patch.tagsRemove.forEach((id) => tags.delete(id));
    payload.tags = [...tags];
  }

  if (patch.customFields.size > 0) {
    const merged = new Map(currentCustomFields);
    patch.customFields.forEach((value, fieldId) => merged.set(fieldId, value));
    payload.custom_fields = [...merged].map(([field, value]) => ({ field, value }));
  }

  return payload;
}
