// src/store/utterances.ts
// Utterances are stored per (session, transcript hash). Re-ingesting the same
// transcript bytes reuses the rows, so evidence ids stay stable across runs.

import type { DbAdapter } from '../db/types.js';
import type { ParsedUtterance } from '../transcripts/parser.js';
import { newId } from '../utils/ids.js';

export interface Utterance {
  id: string;
  sessionId: string;
  transcriptHash: string;
  seq: number;
  speaker: string;
  startMs: number;
  endMs: number;
  text: string;
}

interface UtteranceRow {
  id: string;
  session_id: string;
  transcript_hash: string;
  seq: number;
  speaker: string;
  start_ms: number;
  end_ms: number;
  text: string;
}

function rowToUtterance(row: UtteranceRow): Utterance {
  return {
    id: row.id,
    sessionId: row.session_id,
    transcriptHash: row.transcript_hash,
    seq: row.seq,
    speaker: row.speaker,
    startMs: row.start_ms,
    endMs: row.end_ms,
    text: row.text,
  };
}

export interface UtteranceStore {
  list(sessionId: string, transcriptHash: string): Promise<Utterance[]>;
  /** Existing utterances for the transcript, or newly inserted ones. */
  ensure(
    sessionId: string,
    transcriptHash: string,
    parsed: readonly ParsedUtterance[]
  ): Promise<{ utterances: Utterance[]; created: boolean }>;
}

export function createUtteranceStore(db: DbAdapter): UtteranceStore {
  const store: UtteranceStore = {
    async list(sessionId, transcriptHash) {
      const rows = await db.queryAll<UtteranceRow>(
        `SELECT * FROM utterances WHERE session_id = ? AND transcript_hash = ? ORDER BY seq ASC`,
        [sessionId, transcriptHash]
      );
      return rows.map(rowToUtterance);
    },

    async ensure(sessionId, transcriptHash, parsed) {
      const existing = await store.list(sessionId, transcriptHash);
      if (existing.length > 0 || parsed.length === 0) {
        return { utterances: existing, created: false };
      }

      const utterances: Utterance[] = parsed.map((u, seq) => ({
        id: newId('utt'),
        sessionId,
        transcriptHash,
        seq,
        speaker: u.speaker,
        startMs: u.startMs,
        endMs: u.endMs,
        text: u.text,
      }));

      await db.transaction(async (tx) => {
        for (const u of utterances) {
          await tx.run(
            `INSERT INTO utterances (id, session_id, transcript_hash, seq, speaker, start_ms, end_ms, text)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
            [u.id, u.sessionId, u.transcriptHash, u.seq, u.speaker, u.startMs, u.endMs, u.text]
          );
        }
      });
      return { utterances, created: true };
    },
  };
  return store;
}
