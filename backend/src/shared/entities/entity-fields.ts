/**
 * backend/src/shared/entities/entity-fields.ts
 *
 * Field sets for the shared capability traits. Spread them into an entity's
 * field list in the order the columns should appear.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import { field } from './entity';
import type { EntityField, HasDescription, HasIdentity, HasName, HasTimestamps } from './entity';

export const NAME_MAX_LENGTH = 255;
export const DESCRIPTION_MAX_LENGTH = 1000;

// A Date or an ISO-8601 string with offset; never null, numbers or booleans.
const timestampSchema = z
  .union([z.date(), z.string().datetime({ offset: true })])
  .pipe(z.coerce.date());

export function identityFields<E extends HasIdentity>(): EntityField<E>[] {
  return [
    field<E, string>({
      name: 'id',
      kind: 'uuid',
      hasDefault: true,
      schema: z.string().uuid(),
      get: (e) => e.id,
      set: (e, v) => {
        e.id = v;
      },
    }),
  ];
}

export function timestampFields<E extends HasTimestamps>(): EntityField<E>[] {
  return [
    field<E, Date>({
      name: 'created_at',
      kind: 'timestamp',
      hasDefault: true,
      schema: timestampSchema,
      get: (e) => e.createdAt,
      set: (e, v) => {
        e.createdAt = v;
      },
    }),
    field<E, Date>({
      name: 'updated_at',
      kind: 'timestamp',
      hasDefault: true,
      schema: timestampSchema,
      get: (e) => e.updatedAt,
      set: (e, v) => {
        e.updatedAt = v;
      },
    }),
  ];
}

export function nameField<E extends HasName>(): EntityField<E>[] {
  return [
    field<E, string>({
      name: 'name',
      kind: 'string',
      schema: z.string().min(1).max(NAME_MAX_LENGTH),
      get: (e) => e.name,
      set: (e, v) => {
        e.name = v;
      },
    }),
  ];
}

export function descriptionField<E extends HasDescription>(): EntityField<E>[] {
  return [
    field<E, string | null>({
      name: 'description',
      kind: 'string',
      nullable: true,
      schema: z.string().max(DESCRIPTION_MAX_LENGTH).nullable(),
      get: (e) => e.description,
      set: (e, v) => {
        e.description = v;
      },
    }),
  ];
}

/** Identity + audit timestamps for a brand new entity. */
export function newEntityBase(now: Date = new Date()): HasIdentity & HasTimestamps {
  return {
    id: randomUUID(),
    createdAt: now,
    updatedAt: now,
  };
}
