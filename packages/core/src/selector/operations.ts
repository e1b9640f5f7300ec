import type {
  HttpMethod,
  OpenApiDocument,
  Operation,
  Response,
  Tag,
} from '../openapi/types.js';
import { HTTP_METHODS } from '../openapi/types.js';
import {
  type OperationIdentity,
  type OperationSelection,
  applyOver,
} from './select.js';

export type DocumentTransform = (document: OpenApiDocument) => OpenApiDocument;

export interface OperationEntry extends OperationIdentity {
  operation: Operation;
}

function toTag(tag: string | Tag): Tag {
  return typeof tag === 'string' ? { name: tag } : tag;
}

/**
 * Adds `tags` to every selected operation, keeping first-appearance order,
 * and declares them in the document's top-level `tags`. A tag already
 * declared there under the same name keeps its entry.
 */
export function applyTagsFor(
  selection: OperationSelection,
  tags: ReadonlyArray<string | Tag>
): DocumentTransform {
  const declared = tags.map(toTag);
  const names = declared.map((tag) => tag.name);
  return (document) => {
    const tagged = applyOver(selection, document, (operation) => ({
      ...operation,
      tags: [...new Set([...(operation.tags ?? []), ...names])],
    }));
    const existing = document.tags ?? [];
    const known = new Set(existing.map((tag) => tag.name));
    const added = declared.filter((tag) => {
      if (known.has(tag.name)) return false;
      known.add(tag.name);
      return true;
    });
    return added.length > 0 ? { ...tagged, tags: [...existing, ...added] } : tagged;
  };
}

/** Sets (or replaces) the response for `status` on every selected operation */
export function setResponseFor(
  selection: OperationSelection,
  status: number | 'default',
  response: Response
): DocumentTransform {
  return (document) =>
    applyOver(selection, document, (operation) => ({
      ...operation,
      responses: { ...operation.responses, [String(status)]: response },
    }));
}

/**
 * Operations of `document` in path order, restricted to `selection` (in
 * selection order) when one is given.
 */
export function operationsOf(
  document: OpenApiDocument,
  selection?: OperationSelection
): OperationEntry[] {
  if (selection !== undefined) {
    return selection.flatMap((identity) => {
      const operation = document.paths[identity.path]?.[identity.method];
      return operation !== undefined ? [{ ...identity, operation }] : [];
    });
  }
  const entries: OperationEntry[] = [];
  for (const [path, item] of Object.entries(document.paths)) {
    for (const method of HTTP_METHODS) {
      const operation = item[method];
      if (operation !== undefined) {
        entries.push({ path, method, operation });
      }
    }
  }
  return entries;
}

export function hasOperation(
  document: OpenApiDocument,
  path: string,
  method: HttpMethod
): boolean {
  return document.paths[path]?.[method] !== undefined;
}
