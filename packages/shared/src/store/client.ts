/**
 * Document Store Client
 *
 * Token-authenticated REST client for the document-management backend.
 * Name and id lookups for tags, correspondents, document types and custom
 * fields are cached for the lifetime of the client.
 */

import { config } from '../config';
import { StoreApiError, StoreAuthError, StoreNotFoundError } from '../errors';
import { logger } from '../logger';
import type { FieldValue } from '../merge';
import { storeRequestDurationHistogram } from '../metrics';
import {
  currentCustomFieldValues,
  isEmptyPatch,
  toPatchPayload,
  type CustomFieldDefinition,
  type DocumentPatch,
  type DocumentSnapshot,
  type DocumentStore,
  type NamedEntity,
} from './types';

export interface DocumentStoreClientOptions {
  baseUrl?: string;
  token?: string;
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch;
}

type JsonObject = Record<string, unknown>;

type LookupKind = 'tags' | 'correspondents' | 'document_types' | 'custom_fields';

const PAGE_SIZE = 100;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function numberList(value: unknown): number[] {
  return Array.isArray(value)
    ? value.filter((item): item is number => typeof item === 'number')
    : [];
}

function toFieldValue(value: unknown): FieldValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

function toNamedEntity(value: unknown): NamedEntity | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = numberOrNull(value.id);
  const name = stringOrNull(value.name);
  return id !== null && name !== null ? { id, name } : null;
}

function dateOnly(value: unknown): string | null {
  const text = stringOrNull(value);
  return text ? text.slice(0, 10) : null;
}

export class DocumentStoreClient implements DocumentStore {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  private readonly byName = new Map<string, NamedEntity | null>();
  private readonly byId = new Map<string, string | null>();
  private readonly customFieldTypes = new Map<number, string | null>();

  constructor(options: DocumentStoreClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.storeUrl).replace(/\/+$/, '');
    this.token = options.token ?? config.storeToken;
    this.timeoutMs = options.timeoutMs ?? config.storeTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  // ==========================================================================
  // HTTP
  // ==========================================================================

  private url(pathOrUrl: string, params?: Record<string, string | number>): string {
    const url = pathOrUrl.startsWith('http')
      ? new URL(pathOrUrl)
      : new URL(`${this.baseUrl}/api${pathOrUrl}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async request(
    method: 'GET' | 'POST' | 'PATCH',
    pathOrUrl: string,
    context: string,
    options: { params?: Record<string, string | number>; body?: unknown } = {}
  ): Promise<unknown> {
    const startTime = Date.now();
    const response = await this.fetchImpl(this.url(pathOrUrl, options.params), {
      method,
      headers: {
        Authorization: `Token ${this.token}`,
        Accept: 'application/json',
        ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
      },
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    storeRequestDurationHistogram.observe(
      { method, status: String(response.status) },
      (Date.now() - startTime) / 1000
    );

    if (response.status === 401) {
      throw new StoreAuthError();
    }
    if (response.status === 404) {
      throw new StoreNotFoundError('resource', context);
    }
    if (response.status >= 400) {
      throw new StoreApiError(`API error during ${context}`, response.status, await response.text());
    }

    const text = await response.text();
    return text ? JSON.parse(text) : null;
  }

  private async getObject(
    path: string,
    context: string,
    params?: Record<string, string | number>
  ): Promise<JsonObject> {
    const data = await this.request('GET', path, context, { params });
    if (!isRecord(data)) {
      throw new StoreApiError(`Unexpected response during ${context}`);
    }
    return data;
  }

  /**
   * Every result of a paginated list endpoint.
   */
  private async listAll(
    path: string,
    context: string,
    params: Record<string, string | number> = {}
  ): Promise<unknown[]> {
    const results: unknown[] = [];
    let next: string | null = this.url(path, { ...params, page_size: PAGE_SIZE });

    while (next) {
      const page = await this.getObject(next, context);
      if (Array.isArray(page.results)) {
        results.push(...page.results);
      }
      next = stringOrNull(page.next);
    }

    return results;
  }

  // ==========================================================================
  // Lookups
  // ==========================================================================

  private async findByName(kind: LookupKind, name: string): Promise<JsonObject | null> {
    const data = await this.getObject(`/${kind}/`, `find ${kind} ${name}`, {
      name__iexact: name,
    });
    const first = Array.isArray(data.results) ? data.results[0] : undefined;
    return isRecord(first) ? first : null;
  }

  private async lookupByName(kind: LookupKind, name: string): Promise<NamedEntity | null> {
    const key = `${kind}:${name.toLowerCase()}`;
    if (this.byName.has(key)) {
      return this.byName.get(key) ?? null;
    }

    const raw = await this.findByName(kind, name);
    const entity = toNamedEntity(raw);
    this.byName.set(key, entity);
    if (entity) {
      this.byId.set(`${kind}:${entity.id}`, entity.name);
    }
    if (kind === 'custom_fields' && entity && raw) {
      this.customFieldTypes.set(entity.id, stringOrNull(raw.data_type));
    }
    return entity;
  }

  private async resolveName(kind: LookupKind, id: number): Promise<string | null> {
    const key = `${kind}:${id}`;
    if (this.byId.has(key)) {
      return this.byId.get(key) ?? null;
    }

    let name: string | null = null;
    try {
      const data = await this.getObject(`/${kind}/${id}/`, `resolve ${kind} ${id}`);
      name = stringOrNull(data.name);
    } catch (error) {
      if (!(error instanceof StoreNotFoundError)) {
        throw error;
      }
      logger.warn('Store lookup id not found', { kind, id });
    }

    this.byId.set(key, name);
    return name;
  }

  async getTagByName(name: string): Promise<NamedEntity | null> {
    return this.lookupByName('tags', name);
  }

  async getCorrespondentByName(name: string): Promise<NamedEntity | null> {
    return this.lookupByName('correspondents', name);
  }

  async getDocumentTypeByName(name: string): Promise<NamedEntity | null> {
    return this.lookupByName('document_types', name);
  }

  async getCustomFieldByName(name: string): Promise<CustomFieldDefinition | null> {
    const entity = await this.lookupByName('custom_fields', name);
    return entity ? { ...entity, dataType: this.customFieldTypes.get(entity.id) ?? null } : null;
  }

  private async getOrCreateTag(name: string): Promise<NamedEntity> {
    const existing = await this.getTagByName(name);
    if (existing) {
      return existing;
    }

    const created = toNamedEntity(
      await this.request('POST', '/tags/', `create tag ${name}`, { body: { name } })
    );
    if (!created) {
      throw new StoreApiError(`Unexpected response creating tag ${name}`);
    }
    logger.info('Created tag', { tag: name, tagId: created.id });
    this.byName.set(`tags:${name.toLowerCase()}`, created);
    this.byId.set(`tags:${created.id}`, created.name);
    return created;
  }

  clearCache(): void {
    this.byName.clear();
    this.byId.clear();
    this.customFieldTypes.clear();
  }

  // ==========================================================================
  // Documents
  // ==========================================================================

  async getDocumentSnapshot(docId: number): Promise<DocumentSnapshot> {
    const data = await this.getObject(`/documents/${docId}/`, `get document ${docId}`);

    const tagIds = numberList(data.tags);
    const tagNames: string[] = [];
    for (const tagId of tagIds) {
      const name = await this.resolveName('tags', tagId);
      if (name) {
        tagNames.push(name);
      }
    }

    const correspondentId = numberOrNull(data.correspondent);
    const documentTypeId = numberOrNull(data.document_type);

    const customFields: Record<string, FieldValue> = {};
    const customFieldIds: Record<string, number> = {};
    for (const entry of Array.isArray(data.custom_fields) ? data.custom_fields : []) {
      if (!isRecord(entry)) {
        continue;
      }
      const fieldId = numberOrNull(entry.field);
      const name = fieldId === null ? null : await this.resolveName('custom_fields', fieldId);
      if (fieldId !== null && name) {
        customFields[name] = toFieldValue(entry.value);
        customFieldIds[name] = fieldId;
      }
    }

    return {
      id: numberOrNull(data.id) ?? docId,
      title: stringOrNull(data.title) ?? '',
      content: stringOrNull(data.content) ?? '',
      created: dateOnly(data.created_date) ?? dateOnly(data.created),
      added: stringOrNull(data.added),
      modified: stringOrNull(data.modified),
      originalFileName: stringOrNull(data.original_file_name),
      correspondentId,
      correspondentName:
        correspondentId === null ? null : await this.resolveName('correspondents', correspondentId),
      documentTypeId,
      documentTypeName:
        documentTypeId === null ? null : await this.resolveName('document_types', documentTypeId),
      tagIds,
      tagNames,
      customFields,
      customFieldIds,
    };
  }

  private async documentIds(params: Record<string, string | number>, context: string): Promise<number[]> {
    const results = await this.listAll('/documents/', context, params);
    return results
      .map((result) => (isRecord(result) ? numberOrNull(result.id) : null))
      .filter((id): id is number => id !== null);
  }

  async getDocumentsByTag(tagName: string): Promise<number[]> {
    const tag = await this.getTagByName(tagName);
    if (!tag) {
      return [];
    }
    return this.documentIds({ tags__id__all: tag.id }, `list documents tagged ${tagName}`);
  }

  async getDocumentsByCorrespondent(correspondentName: string): Promise<number[]> {
    const correspondent = await this.getCorrespondentByName(correspondentName);
    if (!correspondent) {
      return [];
    }
    return this.documentIds(
      { correspondent__id: correspondent.id },
      `list documents for ${correspondentName}`
    );
  }

  async patchDocument(docId: number, patch: DocumentPatch, current: DocumentSnapshot): Promise<void> {
    if (isEmptyPatch(patch)) {
      logger.debug('No changes to apply', { docId });
      return;
    }

    const payload = toPatchPayload(patch, current.tagIds, currentCustomFieldValues(current));
    logger.info('Patching document', { docId, keys: Object.keys(payload) });
    await this.request('PATCH', `/documents/${docId}/`, `patch document ${docId}`, {
      body: payload,
    });
  }

  async addTagToDocument(docId: number, tagName: string): Promise<void> {
    const tag = await this.getOrCreateTag(tagName);
    const current = await this.getDocumentSnapshot(docId);
    if (current.tagIds.includes(tag.id)) {
      return;
    }
    await this.patchDocument(docId, { tagsAdd: [tag.id], tagsRemove: [], customFields: new Map() }, current);
  }

  async removeTagFromDocument(docId: number, tagName: string): Promise<void> {
    const tag = await this.getTagByName(tagName);
    if (!tag) {
      return;
    }
    const current = await this.getDocumentSnapshot(docId);
    if (!current.tagIds.includes(tag.id)) {
      return;
    }
    await this.patchDocument(docId, { tagsAdd: [], tagsRemove: [tag.id], customFields: new Map() }, current);
  }
}
