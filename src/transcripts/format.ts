// src/transcripts/format.ts
// Renders utterances as timecoded lines for the extractor and maps the line
// keys back to utterance ids.

export interface FormattableUtterance {
  id: string;
  speaker: string;
  startMs: number;
  text: string;
}

/** 3_723_000 → "01:02:03" */
export function timecode(ms: number): string {
  const total = Math.floor(Math.max(ms, 0) / 1000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  return [hours, minutes, seconds].map((n) => String(n).padStart(2, '0')).join(':');
}

/**
 * One `[key] Speaker: text` line per utterance. The key is the start
 * timecode; utterances sharing a timecode get `#1`, `#2`, ... suffixes.
 */
export function formatTranscript(
  utterances: readonly FormattableUtterance[],
  speakerNames: ReadonlyMap<string, string> = new Map()
): { text: string; keyToId: Map<string, string> } {
  const counts = new Map<string, number>();
  for (const u of utterances) {
    const tc = timecode(u.startMs);
    counts.set(tc, (counts.get(tc) ?? 0) + 1);
  }

  const seen = new Map<string, number>();
  const keyToId = new Map<string, string>();
  const lines: string[] = [];

  for (const u of utterances) {
    const tc = timecode(u.startMs);
    let key = tc;
    if ((counts.get(tc) ?? 0) > 1) {
      const index = (seen.get(tc) ?? 0) + 1;
      seen.set(tc, index);
      key = `${tc}#${index}`;
    }
    const speaker = speakerNames.get(u.speaker) ?? u.speaker;
    lines.push(`[${key}] ${speaker}: ${u.text}`);
    keyToId.set(key, u.id);
  }

  return { text: lines.join('\n'), keyToId };
}
