/**
 * Anki package writer.
 *
 * Builds a schema-11 `collection.anki2` SQLite database in memory with
 * sql.js and zips it with an empty media map into an `.apkg`.
 */

import { createHash } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import JSZip from 'jszip';
import initSqlJs, { type Database } from 'sql.js';
import { escapeHtml, stripTags } from '../content/text';
import type { Card } from '../extraction/types';
import { getLogger } from '../logging/logger';
import defaults from './collection_defaults.json';
import type { PlannedDeck } from './deck_tree';
import { FREETEXT_MODEL, MCQ_MODEL, type NoteModel } from './note_models';

const logger = getLogger('package-writer');

// ============================================================================
// Schema
// ============================================================================

const SCHEMA_VERSION = 11;

const FIELD_SEPARATOR = '\x1f';

const SCHEMA = `
CREATE TABLE col (
  id integer primary key, crt integer not null, mod integer not null, scm integer not null,
  ver integer not null, dty integer not null, usn integer not null, ls integer not null,
  conf text not null, models text not null, decks text not null, dconf text not null, tags text not null
);
CREATE TABLE notes (
  id integer primary key, guid text not null, mid integer not null, mod integer not null,
  usn integer not null, tags text not null, flds text not null, sfld integer not null,
  csum integer not null, flags integer not null, data text not null
);
CREATE TABLE cards (
  id integer primary key, nid integer not null, did integer not null, ord integer not null,
  mod integer not null, usn integer not null, type integer not null, queue integer not null,
  due integer not null, ivl integer not null, factor integer not null, reps integer not null,
  lapses integer not null, left integer not null, odue integer not null, odid integer not null,
  flags integer not null, data text not null
);
CREATE TABLE revlog (
  id integer primary key, cid integer not null, usn integer not null, ease integer not null,
  ivl integer not null, lastIvl integer not null, factor integer not null, time integer not null,
  type integer not null
);
CREATE TABLE graves (usn integer not null, oid integer not null, type integer not null);
CREATE INDEX ix_notes_usn ON notes (usn);
CREATE INDEX ix_cards_usn ON cards (usn);
CREATE INDEX ix_revlog_usn ON revlog (usn);
CREATE INDEX ix_cards_nid ON cards (nid);
CREATE INDEX ix_cards_sched ON cards (did, queue, due);
CREATE INDEX ix_revlog_cid ON revlog (cid);
CREATE INDEX ix_notes_csum ON notes (csum);
`;

// ============================================================================
// Types
// ============================================================================

export interface PackageOptions {
  /** Clock in milliseconds; ids and timestamps derive from it */
  now?: () => number;
}

export interface PackageSummary {
  path: string;
  decks: number;
  notes: number;
}

// ============================================================================
// Fields
// ============================================================================

export function renderSources(sources: readonly string[]): string {
  if (sources.length === 0) {
    return '';
  }
  return `<ul>${sources.map((source) => `<li>${escapeHtml(source)}</li>`).join('')}</ul>`;
}

export function modelFor(card: Card): NoteModel {
  return card.freetext ? FREETEXT_MODEL : MCQ_MODEL;
}

/**
 * Field values in the order of the card's note model.
 */
export function noteFields(card: Card): string[] {
  if (card.freetext) {
    return [card.question, card.answer, card.explanation];
  }
  // MCQ answers are plain option texts; the back template reads them back through textContent
  return [
    card.question,
    escapeHtml(card.answer),
    card.explanation,
    card.scoreText,
    card.percent,
    renderSources(card.sources),
    card.isMulti ? '1' : '',
    card.id,
  ];
}

/**
 * Checksum of the first field: the first 8 hex digits of its SHA-1, as an
 * integer.
 */
export function fieldChecksum(field: string): number {
  const digest = createHash('sha1').update(stripTags(field), 'utf8').digest('hex');
  return parseInt(digest.slice(0, 8), 16);
}

export function formatTags(tags: readonly string[]): string {
  return tags.length > 0 ? ` ${tags.join(' ')} ` : '';
}

// ============================================================================
// Collection JSON
// ============================================================================

function modelJson(model: NoteModel, deckId: number, modSecs: number): Record<string, unknown> {
  return {
    id: model.id,
    name: model.name,
    type: 0,
    mod: modSecs,
    usn: -1,
    sortf: 0,
    did: deckId,
    tmpls: [{ name: 'Card 1', ord: 0, qfmt: model.qfmt, afmt: model.afmt, did: null, bqfmt: '', bafmt: '' }],
    flds: model.fields.map((name, ord) => ({
      name,
      ord,
      sticky: false,
      rtl: false,
      font: 'Arial',
      size: 20,
      media: [],
    })),
    css: model.css,
    latexPre: defaults.latexPre,
    latexPost: defaults.latexPost,
    tags: [],
    vers: [],
    req: [[0, 'any', [0]]],
  };
}

function decksJson(decks: readonly PlannedDeck[], modSecs: number): Record<string, unknown> {
  const entries: Record<string, unknown> = {
    '1': { ...defaults.deck, id: 1, name: 'Default', mod: modSecs },
  };
  for (const deck of decks) {
    entries[String(deck.id)] = { ...defaults.deck, id: deck.id, name: deck.name, mod: modSecs };
  }
  return entries;
}

// ============================================================================
// Writing
// ============================================================================

function populate(db: Database, decks: readonly PlannedDeck[], nowMs: number): number {
  const modSecs = Math.floor(nowMs / 1000);
  const firstDeckId = decks[0]?.id ?? 1;

  const models = {
    [String(MCQ_MODEL.id)]: modelJson(MCQ_MODEL, firstDeckId, modSecs),
    [String(FREETEXT_MODEL.id)]: modelJson(FREETEXT_MODEL, firstDeckId, modSecs),
  };

  db.exec(SCHEMA);
  db.run('INSERT INTO col VALUES (1, ?, ?, ?, ?, 0, 0, 0, ?, ?, ?, ?, ?)', [
    modSecs,
    nowMs,
    nowMs,
    SCHEMA_VERSION,
    JSON.stringify({ ...defaults.conf, curModel: String(MCQ_MODEL.id) }),
    JSON.stringify(models),
    JSON.stringify(decksJson(decks, modSecs)),
    JSON.stringify(defaults.dconf),
    '{}',
  ]);

  let nextId = nowMs;
  let written = 0;
  for (const deck of decks) {
    deck.notes.forEach((note, index) => {
      const fields = noteFields(note.card);
      const noteId = nextId++;
      db.run('INSERT INTO notes VALUES (?, ?, ?, ?, -1, ?, ?, ?, ?, 0, ?)', [
        noteId,
        note.guid,
        modelFor(note.card).id,
        modSecs,
        formatTags(note.tags),
        fields.join(FIELD_SEPARATOR),
        stripTags(fields[0]),
        fieldChecksum(fields[0]),
        '',
      ]);
      db.run('INSERT INTO cards VALUES (?, ?, ?, 0, ?, -1, 0, 0, ?, 0, 0, 0, 0, 0, 0, 0, 0, ?)', [
        nextId++,
        noteId,
        deck.id,
        modSecs,
        index,
        '',
      ]);
      written++;
    });
  }
  return written;
}

function serialize(db: Database, decks: readonly PlannedDeck[], nowMs: number): { notes: number; collection: Uint8Array } {
  try {
    const notes = populate(db, decks, nowMs);
    return { notes, collection: db.export() };
  } finally {
    db.close();
  }
}

/**
 * Build the `.apkg` archive in memory.
 */
export async function buildPackage(
  decks: readonly PlannedDeck[],
  options: PackageOptions = {}
): Promise<{ archive: Buffer; notes: number }> {
  const nowMs = (options.now ?? Date.now)();
  const SQL = await initSqlJs();
  const { notes, collection } = serialize(new SQL.Database(), decks, nowMs);

  const zip = new JSZip();
  zip.file('collection.anki2', collection);
  zip.file('media', '{}');
  const archive = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  return { archive, notes };
}

export async function writePackage(
  decks: readonly PlannedDeck[],
  outputPath: string,
  options: PackageOptions = {}
): Promise<PackageSummary> {
  const { archive, notes } = await buildPackage(decks, options);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, archive);
  logger.info('Package written', { path: outputPath, decks: decks.length, notes, bytes: archive.length });
  return { path: outputPath, decks: decks.length, notes };
}
