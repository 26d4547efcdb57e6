/**
 * backend/src/shared/entities/entity-dict.ts
 *
 * Generic helpers over an EntityDefinition's field registry.
 * Dict keys are column names (`created_at`), not TS property names.
 */

import type { EntityDefinition, EntityField, FieldKind } from './entity';

export type EntityDict = Record<string, unknown>;

/** Fields updateFromDict never writes unless the caller passes its own exclude set. */
export const PROTECTED_FIELDS: ReadonlySet<string> = new Set(['id', 'created_at', 'updated_at']);

function serialize(kind: FieldKind, value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (kind === 'uuid' && typeof value === 'string') return value.toLowerCase();
  return value;
}

export function toDict<E>(
  def: EntityDefinition<E>,
  entity: E,
  exclude: ReadonlySet<string> = new Set(),
): EntityDict {
  const out: EntityDict = {};
  for (const f of def.fields) {
    if (exclude.has(f.name)) continue;
    out[f.name] = serialize(f.kind, f.read(entity));
  }
  return out;
}

function findField<E>(def: EntityDefinition<E>, name: string): EntityField<E> | undefined {
  return def.fields.find((f) => f.name === name);
}

/**
 * Re-stamps `updated_at` (no-op for entities without audit timestamps).
 */
export function touch<E>(def: EntityDefinition<E>, entity: E, now: Date = new Date()): void {
  findField(def, 'updated_at')?.prepare(now)(entity);
}

/**
 * Sets every known, non-excluded field from `data`. Unknown keys are ignored.
 * All values are validated before any is written. Returns the written field names.
 */
export function updateFromDict<E>(
  def: EntityDefinition<E>,
  entity: E,
  data: EntityDict,
  exclude: ReadonlySet<string> = PROTECTED_FIELDS,
): string[] {
  const writes: Array<{ name: string; apply: (entity: E) => void }> = [];

  for (const [key, value] of Object.entries(data)) {
    if (exclude.has(key)) continue;
    const f = findField(def, key);
    if (!f) continue;
    writes.push({ name: key, apply: f.prepare(value) });
  }

  for (const w of writes) w.apply(entity);

  const written = writes.map((w) => w.name);
  if (written.length > 0 && !written.includes('updated_at')) {
    touch(def, entity);
  }

  return written;
}

export function getColumnNames<E>(def: EntityDefinition<E>): string[] {
  return def.fields.map((f) => f.name);
}

/** Non-nullable fields that nothing fills in automatically. */
export function getRequiredFields<E>(def: EntityDefinition<E>): string[] {
  return def.fields.filter((f) => !f.nullable && !f.hasDefault).map((f) => f.name);
}

/** `GameSession(Friday Night Raid)` for named entities, `GameSession(<id>)` otherwise. */
export function describeEntity<E>(def: EntityDefinition<E>, entity: E): string {
  const label = findField(def, 'name') ?? findField(def, 'id');
  const value = label ? label.read(entity) : undefined;
  return `${def.typeName}(${String(value)})`;
}
