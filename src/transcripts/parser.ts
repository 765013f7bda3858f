// src/transcripts/parser.ts
// Transcript formats: JSONL (one utterance per line, times in seconds),
// TXT ("Speaker hh:mm:ss text") and SRT subtitles.

export type TranscriptFormat = 'jsonl' | 'txt' | 'srt';

export interface ParsedUtterance {
  speaker: string;
  startMs: number;
  endMs: number;
  text: string;
}

export class TranscriptParseError extends Error {
  constructor(message: string, readonly line?: number) {
    super(line !== undefined ? `${message} (line ${line})` : message);
    this.name = 'TranscriptParseError';
  }
}

const UNKNOWN_SPEAKER = 'unknown';

function splitLines(content: string): string[] {
  return content.replace(/^\uFEFF/, '').split(/\r\n|\r|\n/);
}

const secondsToMs = (seconds: number) => Math.round(seconds * 1000);

function toSeconds(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return null;
}

/* ---------- JSONL ---------- */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonl(content: string): ParsedUtterance[] {
  const utterances: ParsedUtterance[] = [];
  splitLines(content).forEach((raw, i) => {
    const line = raw.trim();
    if (!line) return;

    let payload: unknown;
    try {
      payload = JSON.parse(line);
    } catch {
      throw new TranscriptParseError('Invalid JSON in transcript', i + 1);
    }
    if (!isRecord(payload)) {
      throw new TranscriptParseError('Transcript line is not an object', i + 1);
    }

    const { speaker, text } = payload;
    const start = toSeconds(payload.start);
    const end = toSeconds(payload.end);
    if (start === null || end === null) {
      throw new TranscriptParseError('Missing start/end', i + 1);
    }

    utterances.push({
      speaker: (typeof speaker === 'string' ? speaker.trim() : '') || UNKNOWN_SPEAKER,
      startMs: secondsToMs(start),
      endMs: secondsToMs(end),
      text: typeof text === 'string' ? text.trim() : '',
    });
  });
  return utterances;
}

/* ---------- TXT ---------- */

const TXT_LINE = /^(.+?)\s+(\d{2}):(\d{2}):(\d{2})\s+(.+)$/;

export function parseTxt(content: string): ParsedUtterance[] {
  const utterances: ParsedUtterance[] = [];
  splitLines(content).forEach((raw, i) => {
    const line = raw.trim();
    if (!line) return;
    const match = TXT_LINE.exec(line);
    if (!match) throw new TranscriptParseError('Invalid TXT transcript line', i + 1);

    const [, speaker = '', hh = '0', mm = '0', ss = '0', text = ''] = match;
    const startMs = ((Number(hh) * 60 + Number(mm)) * 60 + Number(ss)) * 1000;
    utterances.push({
      speaker: speaker.trim() || UNKNOWN_SPEAKER,
      startMs,
      endMs: startMs,
      text: text.trim(),
    });
  });

  // An utterance ends where the next one starts
  for (let i = 0; i < utterances.length - 1; i++) {
    const current = utterances[i];
    const next = utterances[i + 1];
    if (current && next) current.endMs = Math.max(current.startMs, next.startMs);
  }
  return utterances;
}

/* ---------- SRT ---------- */

const SRT_TIME = /(\d{2}):(\d{2}):(\d{2}),(\d{3})\s+-->\s+(\d{2}):(\d{2}):(\d{2}),(\d{3})/;

function srtMs(h: string, m: string, s: string, ms: string): number {
  return ((Number(h) * 60 + Number(m)) * 60 + Number(s)) * 1000 + Number(ms);
}

export function parseSrt(content: string): ParsedUtterance[] {
  const utterances: ParsedUtterance[] = [];
  let block: string[] = [];

  const flush = () => {
    const timeLine = block[1];
    const match = timeLine !== undefined ? SRT_TIME.exec(timeLine) : null;
    if (match) {
      const [, h1 = '0', m1 = '0', s1 = '0', ms1 = '0', h2 = '0', m2 = '0', s2 = '0', ms2 = '0'] =
        match;
      const text = block
        .slice(2)
        .map((t) => t.trim())
        .filter(Boolean)
        .join(' ');
      utterances.push({
        speaker: UNKNOWN_SPEAKER,
        startMs: srtMs(h1, m1, s1, ms1),
        endMs: srtMs(h2, m2, s2, ms2),
        text,
      });
    }
    block = [];
  };

  for (const line of splitLines(content)) {
    if (!line.trim()) {
      flush();
      continue;
    }
    block.push(line);
  }
  flush();
  return utterances;
}

/* ---------- Dispatch ---------- */

export function formatFromFilename(filename: string): TranscriptFormat | null {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.jsonl')) return 'jsonl';
  if (lower.endsWith('.txt')) return 'txt';
  if (lower.endsWith('.srt')) return 'srt';
  return null;
}

export function parseTranscript(format: TranscriptFormat, content: string): ParsedUtterance[] {
  switch (format) {
    case 'jsonl':
      return parseJsonl(content);
    case 'txt':
      return parseTxt(content);
    case 'srt':
      return parseSrt(content);
  }
}
