import { ErrorCode } from '../errors/codes.js';
import type { Schema, SchemaOrRef } from '../openapi/types.js';
import { StructuralConflictError } from '../types/errors.js';
import type { SchemaContext, TypeDescriptor } from './descriptor.js';

export const COMPONENT_SCHEMA_PREFIX = '#/components/schemas/';

export interface RegistryEntry {
  id: string;
  name: string;
  schema: Schema;
}

export function componentRef(name: string): { $ref: string } {
  return { $ref: `${COMPONENT_SCHEMA_PREFIX}${name}` };
}

/**
 * Deduplicating store of named schemas keyed by type identity.
 *
 * Entries keep first-declaration order. A named type is reserved before its
 * schema is computed so recursive types resolve to their own `$ref`.
 */
export class SchemaRegistry implements SchemaContext {
  private readonly byId = new Map<string, RegistryEntry>();
  private readonly idByName = new Map<string, string>();

  ref(descriptor: TypeDescriptor<unknown>): SchemaOrRef {
    const { name } = descriptor;
    if (name === undefined) {
      return descriptor.declare(this);
    }
    this.declareNamed(descriptor, name);
    return componentRef(name);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get(id: string): RegistryEntry | undefined {
    return this.byId.get(id);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): RegistryEntry[] {
    return [...this.byId.values()];
  }

  /** `components.schemas` view, in declaration order */
  toComponents(): Record<string, Schema> {
    const schemas: Record<string, Schema> = {};
    for (const entry of this.byId.values()) {
      schemas[entry.name] = entry.schema;
    }
    return schemas;
  }

  private declareNamed(descriptor: TypeDescriptor<unknown>, name: string): void {
    if (this.byId.has(descriptor.id)) return;

    const owner = this.idByName.get(name);
    if (owner !== undefined && owner !== descriptor.id) {
      throw new StructuralConflictError({
        message: `Schema name "${name}" is claimed by types "${owner}" and "${descriptor.id}"`,
        errorCode: ErrorCode.SCHEMA_NAME_CONFLICT,
        context: {
          typeId: descriptor.id,
          schemaName: name,
          suggestion: 'Give one of the types a distinct schema name',
        },
      });
    }

    const entry: RegistryEntry = { id: descriptor.id, name, schema: {} };
    this.byId.set(descriptor.id, entry);
    this.idByName.set(name, descriptor.id);
    this.byId.set(descriptor.id, { ...entry, schema: descriptor.declare(this) });
  }
}
