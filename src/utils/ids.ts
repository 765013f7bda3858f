// src/utils/ids.ts
import { nanoid } from 'nanoid';

export type IdPrefix = 'cmp' | 'ses' | 'utt' | 'cor' | 'ent' | 'men' | 'thr' | 'thu' | 'scn' | 'evt' | 'quo' | 'ext' | 'run' | 'stp' | 'job';

/** Prefixed random id, e.g. "ent_V1StGXR8_Z5j". */
export function newId(prefix: IdPrefix): string {
  return `${prefix}_${nanoid(12)}`;
}
