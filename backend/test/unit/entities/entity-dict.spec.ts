import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import { AppError } from '../../../src/shared/errors';
import {
  defineEntity,
  describeEntity,
  descriptionField,
  field,
  getColumnNames,
  getRequiredFields,
  identityFields,
  nameField,
  newEntityBase,
  qualifiedTableName,
  timestampFields,
  toDict,
  touch,
  updateFromDict,
} from '../../../src/shared/entities';
import type {
  HasDescription,
  HasIdentity,
  HasName,
  HasTimestamps,
} from '../../../src/shared/entities';

type GameSession = HasIdentity &
  HasTimestamps &
  HasName &
  HasDescription & {
    maxPlayers: number;
  };

const GameSessionEntity = defineEntity<GameSession>({
  typeName: 'GameSession',
  fields: [
    ...identityFields<GameSession>(),
    ...nameField<GameSession>(),
    ...descriptionField<GameSession>(),
    field<GameSession, number>({
      name: 'max_players',
      kind: 'integer',
      schema: z.number().int().min(1),
      get: (e) => e.maxPlayers,
      set: (e, v) => {
        e.maxPlayers = v;
      },
    }),
    ...timestampFields<GameSession>(),
  ],
});

type AuditMark = HasIdentity & HasTimestamps;

const AuditMarkEntity = defineEntity<AuditMark>({
  typeName: 'AuditMark',
  fields: [...identityFields<AuditMark>(), ...timestampFields<AuditMark>()],
});

const ID = '3f2504e0-4f89-41d3-9a0c-0305e82c3301';
const OTHER_ID = '9b2c1a40-7d3e-4c8f-8a51-2f6e0d9c7b13';
const CREATED = new Date('2024-05-01T10:00:00.000Z');

function makeSession(overrides: Partial<GameSession> = {}): GameSession {
  return {
    id: ID,
    createdAt: CREATED,
    updatedAt: CREATED,
    name: 'Friday Night Raid',
    description: null,
    maxPlayers: 12,
    ...overrides,
  };
}

describe('defineEntity', () => {
  it('derives table name and places the table in the app schema', () => {
    expect(GameSessionEntity.tableName).toBe('game_session');
    expect(GameSessionEntity.schema).toBe('larp_manager');
    expect(qualifiedTableName(GameSessionEntity)).toBe('larp_manager.game_session');
  });

  it('keeps declaration order for columns', () => {
    expect(getColumnNames(GameSessionEntity)).toEqual([
      'id',
      'name',
      'description',
      'max_players',
      'created_at',
      'updated_at',
    ]);
  });

  it('rejects duplicate field names', () => {
    expect(() =>
      defineEntity<AuditMark>({
        typeName: 'AuditMark',
        fields: [...identityFields<AuditMark>(), ...identityFields<AuditMark>()],
      }),
    ).toThrowError('Duplicate field "id" on entity AuditMark');
  });
});

describe('getRequiredFields', () => {
  it('lists non-nullable fields without a generated default', () => {
    expect(getRequiredFields(GameSessionEntity)).toEqual(['name', 'max_players']);
    expect(getRequiredFields(AuditMarkEntity)).toEqual([]);
  });
});

describe('toDict', () => {
  it('renders identifiers and timestamps as canonical strings', () => {
    const session = makeSession({ id: ID.toUpperCase() });

    expect(toDict(GameSessionEntity, session)).toEqual({
      id: ID,
      name: 'Friday Night Raid',
      description: null,
      max_players: 12,
      created_at: '2024-05-01T10:00:00.000Z',
      updated_at: '2024-05-01T10:00:00.000Z',
    });
  });

  it('omits excluded fields', () => {
    const dict = toDict(GameSessionEntity, makeSession(), new Set(['id', 'description']));

    expect(dict).not.toHaveProperty('id');
    expect(Object.keys(dict)).toEqual(['name', 'max_players', 'created_at', 'updated_at']);
    expect(typeof dict.created_at).toBe('string');
  });
});

describe('updateFromDict', () => {
  it('leaves identity and audit fields alone by default', () => {
    const session = makeSession();

    const written = updateFromDict(GameSessionEntity, session, {
      id: OTHER_ID,
      created_at: '2020-01-01T00:00:00.000Z',
      name: 'Saturday Siege',
    });

    expect(written).toEqual(['name']);
    expect(session.id).toBe(ID);
    expect(session.createdAt).toBe(CREATED);
    expect(session.name).toBe('Saturday Siege');
  });

  it('re-stamps updated_at when something was written', () => {
    const session = makeSession();

    updateFromDict(GameSessionEntity, session, { max_players: 20 });

    expect(session.maxPlayers).toBe(20);
    expect(session.updatedAt.getTime()).toBeGreaterThan(CREATED.getTime());
  });

  it('silently ignores keys that are not fields', () => {
    const session = makeSession();

    const written = updateFromDict(GameSessionEntity, session, { bogus: 1, maxPlayers: 99 });

    expect(written).toEqual([]);
    expect(session.maxPlayers).toBe(12);
    expect(session.updatedAt).toBe(CREATED);
  });

  it('lets the caller replace the exclusion set', () => {
    const session = makeSession();

    const written = updateFromDict(
      GameSessionEntity,
      session,
      { id: OTHER_ID, updated_at: '2025-01-01T00:00:00.000Z' },
      new Set(),
    );

    expect(written).toEqual(['id', 'updated_at']);
    expect(session.id).toBe(OTHER_ID);
    expect(session.updatedAt.toISOString()).toBe('2025-01-01T00:00:00.000Z');
  });

  it('validates every value before writing any of them', () => {
    const session = makeSession();

    expect(() =>
      updateFromDict(GameSessionEntity, session, { name: 'Renamed', max_players: 0 }),
    ).toThrowError(AppError);

    try {
      updateFromDict(GameSessionEntity, session, { name: 'Renamed', max_players: 'lots' });
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      const e = err as AppError;
      expect(e.status).toBe(400);
      expect(e.message).toBe('Invalid value for field "max_players"');
    }

    expect(session.name).toBe('Friday Night Raid');
    expect(session.maxPlayers).toBe(12);
  });

  it('accepts null for nullable fields only', () => {
    const session = makeSession({ description: 'Night game' });

    updateFromDict(GameSessionEntity, session, { description: null });
    expect(session.description).toBeNull();

    expect(() => updateFromDict(GameSessionEntity, session, { name: null })).toThrowError(
      'Invalid value for field "name"',
    );
  });

  it('rejects audit timestamps that are not a date or an ISO-8601 string', () => {
    const mark: AuditMark = { id: ID, createdAt: CREATED, updatedAt: CREATED };

    expect(() => updateFromDict(AuditMarkEntity, mark, { created_at: null }, new Set())).toThrowError(
      'Invalid value for field "created_at"',
    );
    expect(() => updateFromDict(AuditMarkEntity, mark, { updated_at: true }, new Set())).toThrowError(
      'Invalid value for field "updated_at"',
    );
    expect(() => updateFromDict(AuditMarkEntity, mark, { updated_at: 0 }, new Set())).toThrowError(
      'Invalid value for field "updated_at"',
    );
    expect(() =>
      updateFromDict(AuditMarkEntity, mark, { created_at: 'next tuesday' }, new Set()),
    ).toThrowError('Invalid value for field "created_at"');

    expect(mark.createdAt).toBe(CREATED);
    expect(mark.updatedAt).toBe(CREATED);
  });

  it('accepts Date objects and offset timestamps for audit fields', () => {
    const mark: AuditMark = { id: ID, createdAt: CREATED, updatedAt: CREATED };

    updateFromDict(
      AuditMarkEntity,
      mark,
      { created_at: new Date('2024-01-02T03:04:05.000Z'), updated_at: '2024-01-02T05:04:05+02:00' },
      new Set(),
    );

    expect(mark.createdAt.toISOString()).toBe('2024-01-02T03:04:05.000Z');
    expect(mark.updatedAt.toISOString()).toBe('2024-01-02T03:04:05.000Z');
  });
});

describe('entity helpers', () => {
  it('newEntityBase assigns a UUID and equal timestamps', () => {
    const now = new Date('2024-06-01T12:00:00.000Z');
    const base = newEntityBase(now);

    expect(base.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(base.createdAt).toBe(now);
    expect(base.updatedAt).toBe(now);
    expect(newEntityBase().id).not.toBe(newEntityBase().id);
  });

  it('touch re-stamps updated_at only', () => {
    const mark: AuditMark = { id: ID, createdAt: CREATED, updatedAt: CREATED };
    const later = new Date('2024-07-01T00:00:00.000Z');

    touch(AuditMarkEntity, mark, later);

    expect(mark.updatedAt.toISOString()).toBe('2024-07-01T00:00:00.000Z');
    expect(mark.createdAt).toBe(CREATED);
  });

  it('describeEntity prefers the name, then the id', () => {
    expect(describeEntity(GameSessionEntity, makeSession())).toBe('GameSession(Friday Night Raid)');

    const mark: AuditMark = { id: ID, createdAt: CREATED, updatedAt: CREATED };
    expect(describeEntity(AuditMarkEntity, mark)).toBe(`AuditMark(${ID})`);
  });
});
