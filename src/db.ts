import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

import { DB_PATH } from './config.js';
import type {
  Journey,
  JourneyPatch,
  JourneyStatus,
  JourneyStore,
  Message,
  MilestoneState,
  NewMessage,
  NewUserAttribute,
  Speaker,
  User,
  UserAttribute,
} from './types.js';

let db: Database.Database;

function createSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      first_name  TEXT,
      last_name   TEXT,
      created_at  TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS journeys (
      id                 INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id            INTEGER NOT NULL REFERENCES users(id),
      journey_type       TEXT NOT NULL,
      current_milestone  INTEGER NOT NULL DEFAULT 1,
      status             TEXT NOT NULL DEFAULT 'in_progress' CHECK(status IN ('in_progress','completed','abandoned')),
      created_at         TEXT NOT NULL,
      updated_at         TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_journeys_user ON journeys(user_id, status);

    CREATE TABLE IF NOT EXISTS journey_checkpoints (
      journey_id   INTEGER NOT NULL REFERENCES journeys(id),
      position     INTEGER NOT NULL,
      checkpoint   TEXT NOT NULL,
      value        TEXT,
      recorded_at  TEXT,
      PRIMARY KEY (journey_id, checkpoint)
    );

    CREATE TABLE IF NOT EXISTS journey_milestones (
      journey_id    INTEGER NOT NULL REFERENCES journeys(id),
      milestone     INTEGER NOT NULL,
      completed     INTEGER NOT NULL DEFAULT 0,
      completed_at  TEXT,
      PRIMARY KEY (journey_id, milestone)
    );

    CREATE TABLE IF NOT EXISTS messages (
      id                 INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id            INTEGER NOT NULL REFERENCES users(id),
      journey_id         INTEGER NOT NULL REFERENCES journeys(id),
      speaker            TEXT NOT NULL CHECK(speaker IN ('user','assistant')),
      content            TEXT NOT NULL,
      current_milestone  INTEGER NOT NULL,
      timestamp          TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_messages_journey ON messages(journey_id, timestamp);

    CREATE TABLE IF NOT EXISTS user_attributes (
      id                 INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id            INTEGER NOT NULL REFERENCES users(id),
      attribute_key      TEXT NOT NULL,
      attribute_value    TEXT NOT NULL,
      source_message_id  INTEGER REFERENCES messages(id),
      created_at         TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_user_attributes_user ON user_attributes(user_id, attribute_key);
  `);
}

export function initDatabase(dbPath: string = DB_PATH): void {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  createSchema(db);
}

/** @internal - for tests only. Creates a fresh in-memory database. */
export function _initTestDatabase(): void {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  createSchema(db);
}

export function closeDatabase(): void {
  db?.close();
}

// --- Row types ---

interface UserRow {
  id: number;
  first_name: string | null;
  last_name: string | null;
  created_at: string;
}

interface JourneyRow {
  id: number;
  user_id: number;
  journey_type: string;
  current_milestone: number;
  status: JourneyStatus;
  created_at: string;
  updated_at: string;
}

interface CheckpointRow {
  checkpoint: string;
  value: string | null;
}

interface MilestoneRow {
  milestone: number;
  completed: number;
  completed_at: string | null;
}

interface MessageRow {
  id: number;
  user_id: number;
  journey_id: number;
  speaker: Speaker;
  content: string;
  current_milestone: number;
  timestamp: string;
}

interface UserAttributeRow {
  id: number;
  user_id: number;
  attribute_key: string;
  attribute_value: string;
  source_message_id: number | null;
  created_at: string;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    createdAt: row.created_at,
  };
}

function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    userId: row.user_id,
    journeyId: row.journey_id,
    speaker: row.speaker,
    content: row.content,
    currentMilestone: row.current_milestone,
    timestamp: row.timestamp,
  };
}

function toUserAttribute(row: UserAttributeRow): UserAttribute {
  return {
    id: row.id,
    userId: row.user_id,
    key: row.attribute_key,
    value: row.attribute_value,
    sourceMessageId: row.source_message_id,
    createdAt: row.created_at,
  };
}

function hydrateJourney(row: JourneyRow): Journey {
  const checkpointRows = db
    .prepare<[number], CheckpointRow>(
      `SELECT checkpoint, value FROM journey_checkpoints WHERE journey_id = ? ORDER BY position ASC`,
    )
    .all(row.id);
  const milestoneRows = db
    .prepare<[number], MilestoneRow>(
      `SELECT milestone, completed, completed_at FROM journey_milestones WHERE journey_id = ? ORDER BY milestone ASC`,
    )
    .all(row.id);

  const checkpoints: Record<string, string | null> = {};
  for (const cp of checkpointRows) {
    checkpoints[cp.checkpoint] = cp.value;
  }
  const milestones: Record<number, MilestoneState> = {};
  for (const m of milestoneRows) {
    milestones[m.milestone] = {
      completed: m.completed !== 0,
      completedAt: m.completed_at,
    };
  }

  return {
    id: row.id,
    userId: row.user_id,
    journeyType: row.journey_type,
    currentMilestone: row.current_milestone,
    status: row.status,
    checkpoints,
    milestones,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

// --- Users ---

export function createUser(
  firstName?: string | null,
  lastName?: string | null,
): User {
  const now = new Date().toISOString();
  const result = db
    .prepare(
      `INSERT INTO users (first_name, last_name, created_at) VALUES (?, ?, ?)`,
    )
    .run(firstName ?? null, lastName ?? null, now);
  return {
    id: Number(result.lastInsertRowid),
    firstName: firstName ?? null,
    lastName: lastName ?? null,
    createdAt: now,
  };
}

export function getUser(id: number): User | undefined {
  const row = db
    .prepare<[number], UserRow>(`SELECT * FROM users WHERE id = ?`)
    .get(id);
  return row ? toUser(row) : undefined;
}

export function updateUserNames(
  id: number,
  firstName: string | null,
  lastName: string | null,
): User | undefined {
  db.prepare(`UPDATE users SET first_name = ?, last_name = ? WHERE id = ?`).run(
    firstName,
    lastName,
    id,
  );
  return getUser(id);
}

// --- Journeys ---

export function createJourney(
  userId: number,
  journeyType: string,
  checkpointNames: string[],
  milestoneIndices: number[],
): Journey {
  const insert = db.transaction(() => {
    const now = new Date().toISOString();
    const result = db
      .prepare(
        `INSERT INTO journeys (user_id, journey_type, current_milestone, status, created_at, updated_at)
         VALUES (?, ?, ?, 'in_progress', ?, ?)`,
      )
      .run(userId, journeyType, milestoneIndices[0] ?? 1, now, now);
    const journeyId = Number(result.lastInsertRowid);

    const insertCheckpoint = db.prepare(
      `INSERT INTO journey_checkpoints (journey_id, position, checkpoint) VALUES (?, ?, ?)`,
    );
    checkpointNames.forEach((name, position) => {
      insertCheckpoint.run(journeyId, position, name);
    });

    const insertMilestone = db.prepare(
      `INSERT INTO journey_milestones (journey_id, milestone) VALUES (?, ?)`,
    );
    for (const index of milestoneIndices) {
      insertMilestone.run(journeyId, index);
    }
    return journeyId;
  });

  const journey = getJourney(insert());
  if (!journey) {
    throw new Error(`Journey for user ${userId} vanished after insert`);
  }
  return journey;
}

export function getJourney(id: number): Journey | undefined {
  const row = db
    .prepare<[number], JourneyRow>(`SELECT * FROM journeys WHERE id = ?`)
    .get(id);
  return row ? hydrateJourney(row) : undefined;
}

export function getActiveJourney(userId: number): Journey | undefined {
  const row = db
    .prepare<[number], JourneyRow>(
      `SELECT * FROM journeys WHERE user_id = ? AND status = 'in_progress' ORDER BY id DESC LIMIT 1`,
    )
    .get(userId);
  return row ? hydrateJourney(row) : undefined;
}

export function getLatestJourney(userId: number): Journey | undefined {
  const row = db
    .prepare<[number], JourneyRow>(
      `SELECT * FROM journeys WHERE user_id = ? ORDER BY id DESC LIMIT 1`,
    )
    .get(userId);
  return row ? hydrateJourney(row) : undefined;
}

/**
 * Apply a patch in one transaction. Checkpoint values only fill empty slots
 * and milestone flags only go from 0 to 1, whatever the caller passes.
 */
export function updateJourney(
  id: number,
  patch: JourneyPatch,
): Journey | undefined {
  const apply = db.transaction(() => {
    const now = new Date().toISOString();
    const existing = db
      .prepare<[number], { id: number }>(`SELECT id FROM journeys WHERE id = ?`)
      .get(id);
    if (!existing) return false;

    if (patch.currentMilestone !== undefined) {
      db.prepare(`UPDATE journeys SET current_milestone = ? WHERE id = ?`).run(
        patch.currentMilestone,
        id,
      );
    }
    if (patch.status !== undefined) {
      db.prepare(`UPDATE journeys SET status = ? WHERE id = ?`).run(
        patch.status,
        id,
      );
    }
    if (patch.checkpoints) {
      const fill = db.prepare(
        `UPDATE journey_checkpoints SET value = ?, recorded_at = ?
         WHERE journey_id = ? AND checkpoint = ? AND value IS NULL`,
      );
      for (const [name, value] of Object.entries(patch.checkpoints)) {
        fill.run(value, now, id, name);
      }
    }
    if (patch.milestones) {
      const raise = db.prepare(
        `UPDATE journey_milestones SET completed = 1, completed_at = ?
         WHERE journey_id = ? AND milestone = ? AND completed = 0`,
      );
      for (const [index, state] of Object.entries(patch.milestones)) {
        if (state.completed) {
          raise.run(state.completedAt ?? now, id, Number(index));
        }
      }
    }

    db.prepare(`UPDATE journeys SET updated_at = ? WHERE id = ?`).run(now, id);
    return true;
  });

  return apply() ? getJourney(id) : undefined;
}

// --- Messages ---

export function appendMessage(message: NewMessage): Message {
  const now = new Date().toISOString();
  const result = db
    .prepare(
      `INSERT INTO messages (user_id, journey_id, speaker, content, current_milestone, timestamp)
       VALUES (?, ?, ?, ?, ?, ?)`,
    )
    .run(
      message.userId,
      message.journeyId,
      message.speaker,
      message.content,
      message.currentMilestone,
      now,
    );
  return { ...message, id: Number(result.lastInsertRowid), timestamp: now };
}

export function getRecentMessages(journeyId: number, limit: number): Message[] {
  return db
    .prepare<[number, number], MessageRow>(
      `SELECT * FROM (
        SELECT * FROM messages WHERE journey_id = ? ORDER BY timestamp DESC, id DESC LIMIT ?
      ) sub ORDER BY timestamp ASC, id ASC`,
    )
    .all(journeyId, limit)
    .map(toMessage);
}

export function getMessages(journeyId: number): Message[] {
  return db
    .prepare<[number], MessageRow>(
      `SELECT * FROM messages WHERE journey_id = ? ORDER BY timestamp ASC, id ASC`,
    )
    .all(journeyId)
    .map(toMessage);
}

// --- User attributes ---

export function appendUserAttribute(attribute: NewUserAttribute): UserAttribute {
  const now = new Date().toISOString();
  const result = db
    .prepare(
      `INSERT INTO user_attributes (user_id, attribute_key, attribute_value, source_message_id, created_at)
       VALUES (?, ?, ?, ?, ?)`,
    )
    .run(
      attribute.userId,
      attribute.key,
      attribute.value,
      attribute.sourceMessageId,
      now,
    );
  return { ...attribute, id: Number(result.lastInsertRowid), createdAt: now };
}

export function getUserAttributes(userId: number): UserAttribute[] {
  return db
    .prepare<[number], UserAttributeRow>(
      `SELECT * FROM user_attributes WHERE user_id = ? ORDER BY created_at ASC, id ASC`,
    )
    .all(userId)
    .map(toUserAttribute);
}

export const sqliteStore: JourneyStore = {
  createUser,
  getUser,
  updateUserNames,
  createJourney,
  getJourney,
  getActiveJourney,
  getLatestJourney,
  updateJourney,
  appendMessage,
  getRecentMessages,
  getMessages,
  appendUserAttribute,
  getUserAttributes,
};
