// src/transcripts/source.ts
// Locates and loads a session transcript. Files live under the transcripts
// root as <campaign>/<session>/transcript.{jsonl,txt,srt}.

import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import {
  formatFromFilename,
  parseTranscript,
  type ParsedUtterance,
  type TranscriptFormat,
} from './parser.js';

export interface LoadedTranscript {
  format: TranscriptFormat;
  /** Where the transcript came from (file path, or a label for in-memory sources). */
  origin: string;
  /** sha256 of the raw bytes; part of the run idempotency key. */
  hash: string;
  utterances: ParsedUtterance[];
}

export interface TranscriptSource {
  load(campaignSlug: string, sessionSlug: string): Promise<LoadedTranscript>;
}

export class TranscriptNotFoundError extends Error {
  constructor(campaignSlug: string, sessionSlug: string) {
    super(`No transcript found for ${campaignSlug}/${sessionSlug}`);
    this.name = 'TranscriptNotFoundError';
  }
}

export function hashTranscript(raw: Buffer | string): string {
  return createHash('sha256').update(raw).digest('hex');
}

/** Parse raw transcript bytes into a LoadedTranscript. */
export function loadTranscriptContent(
  format: TranscriptFormat,
  raw: Buffer | string,
  origin: string
): LoadedTranscript {
  const content = typeof raw === 'string' ? raw : raw.toString('utf-8');
  return {
    format,
    origin,
    hash: hashTranscript(raw),
    utterances: parseTranscript(format, content),
  };
}

const PREFERRED_FILES = ['transcript.jsonl', 'transcript.txt', 'transcript.srt'];

/** Slugs become path segments; anything that could escape the root is rejected. */
function safeSegment(value: string): string {
  if (!/^[A-Za-z0-9][A-Za-z0-9._-]*$/.test(value) || value.includes('..')) {
    throw new Error(`Invalid path segment: ${value}`);
  }
  return value;
}

export class FileTranscriptSource implements TranscriptSource {
  constructor(private readonly root: string) {}

  async load(campaignSlug: string, sessionSlug: string): Promise<LoadedTranscript> {
    const dir = path.join(this.root, safeSegment(campaignSlug), safeSegment(sessionSlug));

    for (const name of PREFERRED_FILES) {
      const file = path.join(dir, name);
      const raw = await readIfExists(file);
      const format = formatFromFilename(name);
      if (raw && format) return loadTranscriptContent(format, raw, file);
    }

    // Fall back to the first supported file in the directory
    let entries: string[];
    try {
      entries = (await fs.readdir(dir)).sort();
    } catch (err) {
      if (isNotFound(err)) throw new TranscriptNotFoundError(campaignSlug, sessionSlug);
      throw err;
    }
    for (const name of entries) {
      const format = formatFromFilename(name);
      if (!format) continue;
      const file = path.join(dir, name);
      const raw = await readIfExists(file);
      if (raw) return loadTranscriptContent(format, raw, file);
    }
    throw new TranscriptNotFoundError(campaignSlug, sessionSlug);
  }
}

async function readIfExists(file: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(file);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
