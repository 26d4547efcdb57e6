/**
 * backend/src/shared/entities/entity.ts
 *
 * WHY:
 * - Every persisted entity shares identity, audit timestamps and schema placement.
 * - Entities compose capability traits (HasIdentity, HasTimestamps, ...) instead
 *   of extending a base class chain.
 * - Field access goes through an explicit, ordered field registry, so toDict /
 *   updateFromDict stay generic without reflection.
 *
 * HOW TO USE:
 *   type GameSession = HasIdentity & HasTimestamps & HasName & { maxPlayers: number };
 *
 *   const GameSessionEntity = defineEntity<GameSession>({
 *     typeName: 'GameSession',
 *     fields: [...identityFields(), ...nameField(), maxPlayersField, ...timestampFields()],
 *   });
 */

import { z } from 'zod';

import { AppError } from '../errors';
import { APP_SCHEMA } from './schema';
import { deriveTableName } from './table-name';

export interface HasIdentity {
  id: string;
}

export interface HasTimestamps {
  createdAt: Date;
  updatedAt: Date;
}

export interface HasName {
  name: string;
}

export interface HasDescription {
  description: string | null;
}

export type FieldKind = 'uuid' | 'timestamp' | 'string' | 'integer' | 'boolean';

/**
 * Type-erased view of one entity field, keyed by its column name.
 */
export interface EntityField<E> {
  readonly name: string;
  readonly kind: FieldKind;
  readonly nullable: boolean;
  /** True when the value is generated (app or DB) if the caller omits it. */
  readonly hasDefault: boolean;
  read(entity: E): unknown;
  /** Validates `value` and returns the write to apply. Throws a 400 AppError. */
  prepare(value: unknown): (entity: E) => void;
}

export type FieldSpec<E, V> = {
  name: string;
  kind: FieldKind;
  nullable?: boolean;
  hasDefault?: boolean;
  schema: z.ZodType<V, z.ZodTypeDef, unknown>;
  get: (entity: E) => V;
  set: (entity: E, value: V) => void;
};

export function field<E, V>(spec: FieldSpec<E, V>): EntityField<E> {
  return {
    name: spec.name,
    kind: spec.kind,
    nullable: spec.nullable ?? false,
    hasDefault: spec.hasDefault ?? false,
    read: spec.get,
    prepare(value: unknown) {
      const parsed = spec.schema.safeParse(value);
      if (!parsed.success) {
        throw AppError.validationError(`Invalid value for field "${spec.name}"`, {
          field: spec.name,
          issues: parsed.error.issues.map((i) => i.message),
        });
      }
      const next = parsed.data;
      return (entity: E) => spec.set(entity, next);
    },
  };
}

export interface EntityDefinition<E> {
  readonly typeName: string;
  readonly tableName: string;
  readonly schema: string;
  /** Declaration order is the column order. */
  readonly fields: ReadonlyArray<EntityField<E>>;
}

export function defineEntity<E>(spec: {
  typeName: string;
  fields: ReadonlyArray<EntityField<E>>;
}): EntityDefinition<E> {
  const seen = new Set<string>();
  for (const f of spec.fields) {
    if (seen.has(f.name)) {
      throw new Error(`Duplicate field "${f.name}" on entity ${spec.typeName}`);
    }
    seen.add(f.name);
  }

  return Object.freeze({
    typeName: spec.typeName,
    tableName: deriveTableName(spec.typeName),
    schema: APP_SCHEMA,
    fields: Object.freeze([...spec.fields]),
  });
}

export function qualifiedTableName<E>(def: EntityDefinition<E>): string {
  return `${def.schema}.${def.tableName}`;
}
