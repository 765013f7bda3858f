// src/store/sessionFacts.ts
// Per-run session facts: scenes, events, quotes, plus the structured stage
// outputs (session_extractions) that resumption reuses.

import type { DbAdapter } from '../db/types.js';
import type { EvidenceSpan } from '../evidence/types.js';
import type { VerifiedQuote } from '../evidence/validator.js';
import { parseEvidenceList } from '../extraction/parse.js';
import { EVENT_TYPES, type EventType } from '../extraction/types.js';
import { newId } from '../utils/ids.js';
import { fromFlag, oneOf, parseJsonColumn, stringArray, toFlag } from './rows.js';

/* ---------- Types ---------- */

interface FactBase {
  id: string;
  runId: string;
  sessionId: string;
  evidence: EvidenceSpan[];
  confidence: number | null;
  evidenceComplete: boolean;
  createdAt: number;
}

export interface SceneRecord extends FactBase {
  title: string | null;
  summary: string;
  location: string | null;
  startMs: number | null;
  endMs: number | null;
  participants: string[];
}

export interface EventRecord extends FactBase {
  eventType: EventType;
  summary: string;
  startMs: number | null;
  endMs: number | null;
  entities: string[];
}

export interface QuoteRecord {
  id: string;
  runId: string;
  sessionId: string;
  utteranceId: string;
  charStart: number;
  charEnd: number;
  text: string;
  speaker: string | null;
  note: string | null;
  createdAt: number;
}

export type ExtractionKind = 'facts' | 'summary_plan' | 'summary_text' | 'artifact';

export interface SessionFactsStore {
  insertScenes(scenes: readonly SceneRecord[]): Promise<void>;
  insertEvents(events: readonly EventRecord[]): Promise<void>;
  /** Quotes are only accepted as verified spans. */
  insertQuotes(runId: string, sessionId: string, quotes: readonly VerifiedQuote[]): Promise<QuoteRecord[]>;
  listScenes(runId: string): Promise<SceneRecord[]>;
  listEvents(runId: string): Promise<EventRecord[]>;
  listQuotes(runId: string): Promise<QuoteRecord[]>;
  updateEventEntities(eventId: string, entities: readonly string[]): Promise<void>;
  updateSceneParticipants(sceneId: string, participants: readonly string[]): Promise<void>;
  /** Remove a run's scenes, events and quotes (stage retry). */
  deleteRunFacts(runId: string): Promise<void>;

  saveExtraction(runId: string, sessionId: string, kind: ExtractionKind, payload: unknown): Promise<void>;
  getExtraction(runId: string, kind: ExtractionKind): Promise<unknown>;
}

/* ---------- Rows ---------- */

interface FactRowBase {
  id: string;
  run_id: string;
  session_id: string;
  evidence: string;
  confidence: number | null;
  evidence_complete: number;
  created_at: number;
}

interface SceneRow extends FactRowBase {
  title: string | null;
  summary: string;
  location: string | null;
  start_ms: number | null;
  end_ms: number | null;
  participants: string;
}

interface EventRow extends FactRowBase {
  event_type: string;
  summary: string;
  start_ms: number | null;
  end_ms: number | null;
  entities: string;
}

interface QuoteRow {
  id: string;
  run_id: string;
  session_id: string;
  utterance_id: string;
  char_start: number;
  char_end: number;
  text: string;
  speaker: string | null;
  note: string | null;
  created_at: number;
}

function factBase(row: FactRowBase): FactBase {
  return {
    id: row.id,
    runId: row.run_id,
    sessionId: row.session_id,
    evidence: parseEvidenceList(parseJsonColumn(row.evidence, [])),
    confidence: row.confidence,
    evidenceComplete: fromFlag(row.evidence_complete),
    createdAt: row.created_at,
  };
}

function rowToScene(row: SceneRow): SceneRecord {
  return {
    ...factBase(row),
    title: row.title,
    summary: row.summary,
    location: row.location,
    startMs: row.start_ms,
    endMs: row.end_ms,
    participants: stringArray(parseJsonColumn(row.participants, [])),
  };
}

function rowToEvent(row: EventRow): EventRecord {
  return {
    ...factBase(row),
    eventType: oneOf(EVENT_TYPES, row.event_type, 'generic'),
    summary: row.summary,
    startMs: row.start_ms,
    endMs: row.end_ms,
    entities: stringArray(parseJsonColumn(row.entities, [])),
  };
}

function rowToQuote(row: QuoteRow): QuoteRecord {
  return {
    id: row.id,
    runId: row.run_id,
    sessionId: row.session_id,
    utteranceId: row.utterance_id,
    charStart: row.char_start,
    charEnd: row.char_end,
    text: row.text,
    speaker: row.speaker,
    note: row.note,
    createdAt: row.created_at,
  };
}

/* ---------- Store ---------- */

export function createSessionFactsStore(db: DbAdapter): SessionFactsStore {
  return {
    async insertScenes(scenes) {
      await db.transaction(async (tx) => {
        for (const s of scenes) {
          await tx.run(
            `INSERT INTO scenes (
               id, run_id, session_id, title, summary, location, start_ms, end_ms,
               participants, evidence, confidence, evidence_complete, created_at
             ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
              s.id, s.runId, s.sessionId, s.title, s.summary, s.location, s.startMs, s.endMs,
              JSON.stringify(s.participants), JSON.stringify(s.evidence), s.confidence,
              toFlag(s.evidenceComplete), s.createdAt,
            ]
          );
        }
      });
    },

    async insertEvents(events) {
      await db.transaction(async (tx) => {
        for (const e of events) {
          await tx.run(
            `INSERT INTO events (
               id, run_id, session_id, event_type, summary, start_ms, end_ms,
               entities, evidence, confidence, evidence_complete, created_at
             ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
              e.id, e.runId, e.sessionId, e.eventType, e.summary, e.startMs, e.endMs,
              JSON.stringify(e.entities), JSON.stringify(e.evidence), e.confidence,
              toFlag(e.evidenceComplete), e.createdAt,
            ]
          );
        }
      });
    },

    async insertQuotes(runId, sessionId, quotes) {
      const now = Date.now();
      const records: QuoteRecord[] = quotes.map((q) => ({
        id: newId('quo'),
        runId,
        sessionId,
        utteranceId: q.span.utteranceId,
        charStart: q.span.charStart,
        charEnd: q.span.charEnd,
        text: q.span.text,
        speaker: q.speaker,
        note: q.note,
        createdAt: now,
      }));

      await db.transaction(async (tx) => {
        for (const r of records) {
          await tx.run(
            `INSERT INTO quotes (id, run_id, session_id, utterance_id, char_start, char_end, text, speaker, note, created_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [r.id, r.runId, r.sessionId, r.utteranceId, r.charStart, r.charEnd, r.text, r.speaker, r.note, r.createdAt]
          );
        }
      });
      return records;
    },

    async listScenes(runId) {
      const rows = await db.queryAll<SceneRow>(
        `SELECT * FROM scenes WHERE run_id = ? ORDER BY rowid ASC`,
        [runId]
      );
      return rows.map(rowToScene);
    },

    async listEvents(runId) {
      const rows = await db.queryAll<EventRow>(
        `SELECT * FROM events WHERE run_id = ? ORDER BY rowid ASC`,
        [runId]
      );
      return rows.map(rowToEvent);
    },

    async listQuotes(runId) {
      const rows = await db.queryAll<QuoteRow>(
        `SELECT * FROM quotes WHERE run_id = ? ORDER BY rowid ASC`,
        [runId]
      );
      return rows.map(rowToQuote);
    },

    async updateEventEntities(eventId, entities) {
      await db.run(`UPDATE events SET entities = ? WHERE id = ?`, [JSON.stringify(entities), eventId]);
    },

    async updateSceneParticipants(sceneId, participants) {
      await db.run(`UPDATE scenes SET participants = ? WHERE id = ?`, [
        JSON.stringify(participants),
        sceneId,
      ]);
    },

    async deleteRunFacts(runId) {
      await db.run(`DELETE FROM quotes WHERE run_id = ?`, [runId]);
      await db.run(`DELETE FROM events WHERE run_id = ?`, [runId]);
      await db.run(`DELETE FROM scenes WHERE run_id = ?`, [runId]);
    },

    async saveExtraction(runId, sessionId, kind, payload) {
      await db.run(
        `INSERT INTO session_extractions (id, run_id, session_id, kind, payload, created_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT (run_id, kind) DO UPDATE SET payload = excluded.payload, created_at = excluded.created_at`,
        [newId('ext'), runId, sessionId, kind, JSON.stringify(payload), Date.now()]
      );
    },

    async getExtraction(runId, kind) {
      const row = await db.queryOne<{ payload: string }>(
        `SELECT payload FROM session_extractions WHERE run_id = ? AND kind = ?`,
        [runId, kind]
      );
      return row ? parseJsonColumn(row.payload) : null;
    },
  };
}
