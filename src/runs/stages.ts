// src/runs/stages.ts
// Pipeline stages. Each stage reads what earlier stages stored for the run,
// so any stage can be re-entered on retry or resumption without replaying
// the ones before it.
//
//   ingest   transcript → utterances
//   extract  extractor output (raw, stored as-is)
//   persist  evidence-checked mentions, scenes, events, quotes
//   resolve  canonical entities/threads, links, thread updates
//   plan     summary plan
//   write    summary text
//   render   artifact

import type { Logger } from 'pino';
import { campaignLockKey } from '../canon/ledger.js';
import type { CanonicalMap, CanonicalEntity } from '../canon/canonicalMap.js';
import { EvidenceIntegrityViolation } from '../canon/errors.js';
import { compareStrings } from '../canon/identityGraph.js';
import type { CanonicalMapBuilder } from '../canon/mapBuilder.js';
import { canonicalizeNames, resolveMentions, resolveThreads } from '../canon/resolution.js';
import type { KeyedMutex } from '../concurrency/keyedMutex.js';
import type { DbAdapter } from '../db/types.js';
import { EvidenceValidator, type VerifiedQuote } from '../evidence/validator.js';
import { parseSessionFacts, parseSummaryPlan } from '../extraction/parse.js';
import type {
  Extractor,
  Renderer,
  SessionBundle,
  SessionFacts,
  Summarizer,
} from '../extraction/types.js';
import { recordDroppedMentions, recordEvidenceOutcomes } from '../observability/metrics.js';
import type { Campaign, Session } from '../store/campaigns.js';
import type { MentionRecord } from '../store/entities.js';
import type { Stores } from '../store/index.js';
import type { Run } from '../store/runs.js';
import type { EventRecord, SceneRecord } from '../store/sessionFacts.js';
import type { ThreadUpdateRecord } from '../store/threads.js';
import type { Utterance } from '../store/utterances.js';
import { formatTranscript } from '../transcripts/format.js';
import type { TranscriptSource } from '../transcripts/source.js';
import { newId } from '../utils/ids.js';
import type { StageCounters, StageName } from './types.js';

/* ---------- Types ---------- */

export interface StageContext {
  run: Run;
  campaign: Campaign;
  session: Session;
  log: Logger;
}

export type StageHandler = (ctx: StageContext) => Promise<StageCounters>;

export type StageRegistry = Record<StageName, StageHandler>;

export interface StageDeps {
  db: DbAdapter;
  stores: Stores;
  maps: CanonicalMapBuilder;
  transcripts: TranscriptSource;
  extractor: Extractor;
  summarizer: Summarizer;
  renderer: Renderer;
  /** Campaign write locks, shared with the correction ledger. */
  locks: KeyedMutex;
}

/* ---------- Helpers ---------- */

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function uniqueSpeakers(utterances: readonly Utterance[]): string[] {
  return [...new Set(utterances.map((u) => u.speaker))];
}

/** Live ids for entity names, de-duplicated; hidden and unknown names are skipped. */
function entityIdsFor(names: readonly string[], map: CanonicalMap): string[] {
  const ids = new Set<string>();
  for (const name of names) {
    const resolution = map.resolveEntityName(name);
    if (resolution.status === 'live') ids.add(resolution.id);
  }
  return [...ids];
}

/** The live canonical record an entity id displays as, if any. */
function liveEntity(map: CanonicalMap, id: string): CanonicalEntity | undefined {
  const own = map.entities.get(id);
  if (!own || own.hidden) return undefined;
  const final = map.entities.get(map.entities.resolveId(id));
  return final && !final.hidden ? final : undefined;
}

/* ---------- Stages ---------- */

export function createStages(deps: StageDeps): StageRegistry {
  const { stores } = deps;

  async function loadUtterances(ctx: StageContext): Promise<Utterance[]> {
    const utterances = await stores.utterances.list(ctx.session.id, ctx.run.transcriptHash);
    if (utterances.length === 0) {
      throw new Error(`No utterances ingested for transcript ${ctx.run.transcriptHash}`);
    }
    return utterances;
  }

  /** Re-validate the stored extractor output against this run's utterances. */
  async function loadFacts(
    ctx: StageContext
  ): Promise<{ utterances: Utterance[]; facts: SessionFacts }> {
    const utterances = await loadUtterances(ctx);
    const output = await stores.facts.getExtraction(ctx.run.id, 'facts');
    if (output === null) throw new Error(`No extraction stored for run ${ctx.run.id}`);
    const { keyToId } = formatTranscript(utterances);
    return { utterances, facts: parseSessionFacts(output, keyToId).facts };
  }

  async function buildBundle(ctx: StageContext): Promise<SessionBundle> {
    const { run, campaign, session } = ctx;
    const map = await deps.maps.build(campaign.id);

    const cast = new Map<string, { entity: CanonicalEntity; mentions: number }>();
    for (const [id, count] of await stores.entities.countLinksByRun(run.id)) {
      const entity = liveEntity(map, id);
      if (!entity) continue;
      const entry = cast.get(entity.id) ?? { entity, mentions: 0 };
      entry.mentions += count;
      cast.set(entity.id, entry);
    }
    const entities = [...cast.values()]
      .sort(
        (a, b) =>
          b.mentions - a.mentions || compareStrings(a.entity.canonicalName, b.entity.canonicalName)
      )
      .map(({ entity, mentions }) => ({
        id: entity.id,
        name: entity.canonicalName,
        entityType: entity.entityType,
        mentions,
      }));

    const threadNotes = new Map<string, string[]>();
    for (const update of await stores.threads.listUpdatesByRun(run.id)) {
      const resolution = map.threads.resolveId(update.threadId);
      if (resolution.status !== 'live') continue;
      const notes = threadNotes.get(resolution.id) ?? [];
      notes.push(update.note);
      threadNotes.set(resolution.id, notes);
    }
    const threads: SessionBundle['threads'] = [];
    for (const [id, notes] of threadNotes) {
      const thread = map.threads.get(id);
      if (thread) threads.push({ id, title: thread.title, status: thread.status, notes });
    }

    // Quotes are re-checked against the transcript before they are shown
    const validator = new EvidenceValidator(await loadUtterances(ctx));
    const quotes: SessionBundle['quotes'] = [];
    for (const q of await stores.facts.listQuotes(run.id)) {
      // Stored offsets must still cite the stored text; no relocation here
      const check = validator.verifyQuote({ ...q, text: null });
      if (!check.ok || check.quote.span.text !== q.text) {
        ctx.log.warn({ quoteId: q.id }, 'Quote no longer matches its utterance; left out');
        continue;
      }
      quotes.push({ id: q.id, text: q.text, speaker: q.speaker });
    }

    const events = (await stores.facts.listEvents(run.id)).map((e) => ({
      id: e.id,
      eventType: e.eventType,
      summary: e.summary,
      startMs: e.startMs,
    }));
    const scenes = (await stores.facts.listScenes(run.id)).map((s) => ({
      id: s.id,
      title: s.title,
      summary: s.summary,
    }));

    return {
      campaignId: campaign.id,
      sessionId: session.id,
      sessionTitle: session.title,
      runId: run.id,
      entities,
      threads,
      events,
      scenes,
      quotes,
    };
  }

  /* ----- ingest ----- */

  const ingest: StageHandler = async (ctx) => {
    const transcript = await deps.transcripts.load(ctx.campaign.slug, ctx.session.slug);
    if (transcript.hash !== ctx.run.transcriptHash) {
      throw new Error(`Transcript ${transcript.origin} changed since the run was created`);
    }
    if (transcript.utterances.length === 0) {
      throw new Error(`Transcript ${transcript.origin} has no utterances`);
    }
    const { utterances, created } = await stores.utterances.ensure(
      ctx.session.id,
      transcript.hash,
      transcript.utterances
    );
    return {
      utterances: utterances.length,
      utterances_created: created ? utterances.length : 0,
    };
  };

  /* ----- extract ----- */

  const extract: StageHandler = async (ctx) => {
    const { run, campaign, session } = ctx;
    const utterances = await loadUtterances(ctx);
    const map = await deps.maps.build(campaign.id);
    const { text, keyToId } = formatTranscript(utterances);

    const output = await deps.extractor.extract({
      campaignId: campaign.id,
      sessionId: session.id,
      transcript: text,
      speakers: uniqueSpeakers(utterances),
      lines: utterances.map((u) => ({
        utteranceId: u.id,
        speaker: u.speaker,
        startMs: u.startMs,
        text: u.text,
      })),
      canonical: map.entities.snapshot(),
    });

    // Throws on output that is not an object at all, so the stage retries
    const { facts, issues } = parseSessionFacts(output, keyToId);
    if (issues.length > 0) {
      ctx.log.warn({ issues: issues.slice(0, 20), count: issues.length }, 'Skipped malformed extractor items');
    }
    await stores.facts.saveExtraction(run.id, session.id, 'facts', output);

    return {
      mentions: facts.mentions.length,
      scenes: facts.scenes.length,
      events: facts.events.length,
      threads: facts.threads.length,
      quotes: facts.quotes.length,
      schema_issues: issues.length,
    };
  };

  /* ----- persist ----- */

  const persist: StageHandler = async (ctx) => {
    const { run, session } = ctx;
    const { utterances, facts } = await loadFacts(ctx);
    const validator = new EvidenceValidator(utterances);
    const now = Date.now();
    let incomplete = 0;

    const mentions: MentionRecord[] = facts.mentions.map((m) => {
      const cleaned = validator.cleanFact(m);
      if (!cleaned.evidenceComplete) incomplete++;
      return {
        id: newId('men'),
        runId: run.id,
        sessionId: session.id,
        text: m.text,
        entityType: m.entityType,
        description: m.description,
        evidence: cleaned.evidence,
        confidence: cleaned.confidence,
        evidenceComplete: cleaned.evidenceComplete,
        resolvedEntityId: null,
        createdAt: now,
      };
    });

    const scenes: SceneRecord[] = facts.scenes.map((s) => {
      const cleaned = validator.cleanFact(s);
      if (!cleaned.evidenceComplete) incomplete++;
      return {
        id: newId('scn'),
        runId: run.id,
        sessionId: session.id,
        title: s.title,
        summary: s.summary,
        location: s.location,
        startMs: s.startMs,
        endMs: s.endMs,
        participants: s.participants,
        createdAt: now,
        ...cleaned,
      };
    });

    const events: EventRecord[] = facts.events.map((e) => {
      const cleaned = validator.cleanFact(e);
      if (!cleaned.evidenceComplete) incomplete++;
      return {
        id: newId('evt'),
        runId: run.id,
        sessionId: session.id,
        eventType: e.eventType,
        summary: e.summary,
        startMs: e.startMs,
        endMs: e.endMs,
        entities: e.entities,
        createdAt: now,
        ...cleaned,
      };
    });

    const quotes: VerifiedQuote[] = [];
    let quotesDropped = 0;
    for (const candidate of facts.quotes) {
      const result = validator.verifyQuote(candidate);
      if (!result.ok) {
        quotesDropped++;
        continue;
      }
      try {
        validator.assertDisplayable(result.quote.span);
      } catch (err) {
        if (!(err instanceof EvidenceIntegrityViolation)) throw err;
        ctx.log.warn({ utteranceId: candidate.utteranceId, err: err.message }, 'Quote dropped');
        quotesDropped++;
        continue;
      }
      quotes.push(result.quote);
    }

    // A retried persist replaces whatever an earlier attempt left behind
    await deps.db.transaction(async () => {
      await stores.facts.deleteRunFacts(run.id);
      await stores.entities.deleteMentionsByRun(run.id);
      await stores.entities.insertMentions(mentions);
      await stores.facts.insertScenes(scenes);
      await stores.facts.insertEvents(events);
      await stores.facts.insertQuotes(run.id, session.id, quotes);
    });

    const counts = validator.counts();
    recordEvidenceOutcomes(counts);
    if (counts.dropped > 0) {
      ctx.log.info({ dropReasons: counts.dropReasons }, 'Evidence spans dropped');
    }

    return {
      mentions: mentions.length,
      scenes: scenes.length,
      events: events.length,
      quotes: quotes.length,
      quotes_dropped: quotesDropped,
      facts_incomplete: incomplete,
      spans_valid: counts.valid,
      spans_repaired: counts.repaired,
      spans_dropped: counts.dropped,
    };
  };

  /* ----- resolve ----- */

  const resolve: StageHandler = async (ctx) => {
    const { run, campaign, session } = ctx;

    return deps.locks.runExclusive(campaignLockKey(campaign.id), async () => {
      const { utterances, facts } = await loadFacts(ctx);
      const validator = new EvidenceValidator(utterances);

      const applied = await deps.db.transaction(async () => {
        // Uncached folds: the map must see rows written inside this transaction
        const before = (await deps.maps.preview(campaign.id, [])).map;
        const mentions = await stores.entities.listMentionsByRun(run.id);
        const plan = resolveMentions(campaign.id, mentions, before);

        for (const e of plan.newEntities) {
          await stores.entities.create({
            id: e.id,
            campaignId: campaign.id,
            entityType: e.entityType,
            name: e.name,
            description: e.description,
            runId: run.id,
          });
        }
        for (const alias of plan.learnedAliases) {
          await stores.entities.addAlias(alias.entityId, alias.alias, run.id);
        }
        for (const { mention, outcome } of plan.outcomes) {
          if (outcome.kind === 'linked') {
            await stores.entities.resolveMention(mention, outcome.entityId);
          }
        }

        const map = (await deps.maps.preview(campaign.id, [])).map;

        const events = await stores.facts.listEvents(run.id);
        for (const event of events) {
          const names = canonicalizeNames(event.entities, map);
          if (!sameList(names, event.entities)) {
            await stores.facts.updateEventEntities(event.id, names);
          }
        }
        for (const scene of await stores.facts.listScenes(run.id)) {
          const names = canonicalizeNames(scene.participants, map);
          if (!sameList(names, scene.participants)) {
            await stores.facts.updateSceneParticipants(scene.id, names);
          }
        }

        const threadPlan = resolveThreads(campaign.id, facts.threads, map);
        for (const t of threadPlan.newThreads) {
          await stores.threads.create({ ...t, campaignId: campaign.id, runId: run.id });
        }

        const now = Date.now();
        const updates: ThreadUpdateRecord[] = [];
        for (const { candidate, outcome } of threadPlan.outcomes) {
          if (outcome.kind !== 'linked') continue;
          for (const u of candidate.updates) {
            const cleaned = validator.cleanEvidence(u.evidence);
            updates.push({
              id: newId('thu'),
              runId: run.id,
              sessionId: session.id,
              threadId: outcome.threadId,
              updateType: u.updateType,
              note: u.note,
              evidence: cleaned.kept,
              evidenceComplete: cleaned.dropped === 0,
              relatedEventIds: u.relatedEventIndexes.flatMap((i) => {
                const event = events[i];
                return event ? [event.id] : [];
              }),
              relatedEntityIds: entityIdsFor(u.relatedEntities, map),
              createdAt: now,
            });
          }
        }
        await stores.threads.deleteUpdatesByRun(run.id);
        await stores.threads.insertUpdates(updates);

        return {
          plan,
          threadPlan,
          updatesCreated: updates.length,
          updatesIncomplete: updates.filter((u) => !u.evidenceComplete).length,
        };
      });

      deps.maps.invalidate(campaign.id);

      const { plan, threadPlan, updatesCreated, updatesIncomplete } = applied;
      const counts = validator.counts();
      recordEvidenceOutcomes(counts);
      if (counts.dropped > 0) {
        ctx.log.info({ dropReasons: counts.dropReasons }, 'Thread update evidence spans dropped');
      }
      recordDroppedMentions('empty', plan.counters.mentions_dropped_empty);
      recordDroppedMentions('hidden', plan.counters.mentions_dropped_hidden);
      recordDroppedMentions('alias_collision', plan.counters.alias_collisions);
      if (plan.collisions.length > 0) {
        ctx.log.warn({ collisions: plan.collisions }, 'Names removed by corrections left unresolved');
      }

      return {
        ...plan.counters,
        ...threadPlan.counters,
        thread_updates_created: updatesCreated,
        thread_updates_incomplete: updatesIncomplete,
        spans_valid: counts.valid,
        spans_repaired: counts.repaired,
        spans_dropped: counts.dropped,
      };
    });
  };

  /* ----- plan / write / render ----- */

  const plan: StageHandler = async (ctx) => {
    const bundle = await buildBundle(ctx);
    const summaryPlan = parseSummaryPlan(await deps.summarizer.plan(bundle));
    await stores.facts.saveExtraction(ctx.run.id, ctx.session.id, 'summary_plan', summaryPlan);
    return { beats: summaryPlan.beats.length, quotes_available: bundle.quotes.length };
  };

  const write: StageHandler = async (ctx) => {
    const stored = await stores.facts.getExtraction(ctx.run.id, 'summary_plan');
    if (stored === null) throw new Error(`No summary plan stored for run ${ctx.run.id}`);
    const summaryPlan = parseSummaryPlan(stored);
    const bundle = await buildBundle(ctx);
    const text = await deps.summarizer.write(bundle, summaryPlan);
    await stores.facts.saveExtraction(ctx.run.id, ctx.session.id, 'summary_text', text);
    return { characters: text.length };
  };

  const render: StageHandler = async (ctx) => {
    const text = await stores.facts.getExtraction(ctx.run.id, 'summary_text');
    if (typeof text !== 'string') throw new Error(`No summary text stored for run ${ctx.run.id}`);
    const bundle = await buildBundle(ctx);
    const artifact = await deps.renderer.render(bundle, text);
    await stores.facts.saveExtraction(ctx.run.id, ctx.session.id, 'artifact', artifact);
    ctx.log.info({ path: artifact.path, bytes: artifact.bytes }, 'Summary rendered');
    return { bytes: artifact.bytes };
  };

  return { ingest, extract, persist, resolve, plan, write, render };
}
