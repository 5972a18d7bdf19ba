import { test, expect } from '@playwright/test';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import JSZip from 'jszip';
import initSqlJs, { type QueryExecResult } from 'sql.js';
import { DECK_ID_BASE, detectCurriculum, noteGuid, planDecks } from '../../src/export/deck_tree';
import { MCQ_MODEL } from '../../src/export/note_models';
import { buildPackage, fieldChecksum, noteFields, writePackage } from '../../src/export/package_writer';
import { makeCard } from '../support/cards';

const collectionCards = [
  makeCard({ id: '1', deckTitle: 'Chest Pain', patientInfo: 'Jane Doe' }),
  makeCard({ id: '2', deckTitle: 'Chest Pain', patientInfo: 'John Roe' }),
  makeCard({ id: '3', deckTitle: 'Chest Pain', patientInfo: 'Jane Doe' }),
  makeCard({
    id: '4',
    deckTitle: 'Syncope',
    patientInfo: 'Sequential Deck',
    isSequential: true,
    tags: ['Sequential_Extraction'],
  }),
  makeCard({
    id: '5',
    deckTitle: 'Syncope',
    patientInfo: 'Sequential Deck',
    isSequential: true,
    tags: ['Sequential_Extraction'],
  }),
];

function rows(results: QueryExecResult[]): unknown[][] {
  return results.length > 0 ? results[0].values : [];
}

test.describe('Curriculum detection', () => {
  test('recognizes block.unit.week names', () => {
    expect(detectCurriculum('RIME 1.1.3')).toEqual({ base: 'RIME', block: '1', unit: '1', week: '3' });
    expect(detectCurriculum(' rime 2.3.4 ')).toEqual({ base: 'RIME', block: '2', unit: '3', week: '4' });
  });

  test('ignores other names', () => {
    expect(detectCurriculum('Random Deck Name')).toBeNull();
  });
});

test.describe('Deck tree', () => {
  test('curriculum collections nest under block, unit and week', () => {
    const decks = planDecks({ mode: 'collection', name: 'RIME 1.1.3', cards: collectionCards });

    expect(decks.map((deck) => [deck.id, deck.name, deck.notes.map((note) => note.card.id)])).toEqual([
      [DECK_ID_BASE, 'RIME::Block 1::Unit 1::Week 3::Chest Pain::Jane Doe', ['1', '3']],
      [DECK_ID_BASE + 1, 'RIME::Block 1::Unit 1::Week 3::Chest Pain::John Roe', ['2']],
      [DECK_ID_BASE + 2, 'RIME::Block 1::Unit 1::Week 3::Syncope (Sequential)', ['4', '5']],
    ]);
    expect(decks[0].notes[0].tags).toEqual([
      'Curriculum_RIME',
      'Block_1',
      'Unit_1',
      'Week_3',
      'Deck_Chest_Pain',
      'Patient_Jane_Doe',
    ]);
    expect(decks[2].notes[1].tags).toEqual([
      'Sequential_Extraction',
      'Curriculum_RIME',
      'Block_1',
      'Unit_1',
      'Week_3',
      'Deck_Syncope',
      'Sequential_Mode',
      'Question_2',
    ]);
  });

  test('other collections nest under the collection name', () => {
    const decks = planDecks({ mode: 'collection', name: 'Random Deck Name', cards: collectionCards });

    expect(decks.map((deck) => deck.name)).toEqual([
      'Random Deck Name::Chest Pain::Jane Doe',
      'Random Deck Name::Chest Pain::John Roe',
      'Random Deck Name::Syncope (Sequential)',
    ]);
    expect(decks[1].notes[0].tags).toEqual(['Collection_Random_Deck_Name', 'Deck_Chest_Pain', 'Patient_John_Roe']);
  });

  test('a single deck puts its sequential cards first', () => {
    const decks = planDecks({
      mode: 'single',
      name: 'Deck 7',
      cards: [
        makeCard({ id: '1', deckTitle: 'Deck 7', patientInfo: 'Jane Doe' }),
        makeCard({ id: '2', deckTitle: 'Deck 7', patientInfo: 'Sequential Deck', isSequential: true }),
      ],
    });

    expect(decks.map((deck) => [deck.id, deck.name])).toEqual([
      [DECK_ID_BASE, 'Deck 7 (Sequential Deck)'],
      [DECK_ID_BASE + 1, 'Deck 7::Jane Doe'],
    ]);
    expect(decks[1].notes[0].tags).toEqual(['Deck_Deck_7', 'Patient_Jane_Doe']);
  });

  test('note guids are stable per card', () => {
    const card = makeCard({ id: '42' });
    expect(noteGuid(card)).toBe(noteGuid(makeCard({ id: '42' })));
    expect(noteGuid(card)).not.toBe(noteGuid(makeCard({ id: '43' })));
    expect(noteGuid(card)).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});

test.describe('Package writer', () => {
  const now = 1_700_000_000_000;
  const decks = planDecks({
    mode: 'single',
    name: 'Deck 7',
    cards: [
      makeCard({
        id: '1',
        deckTitle: 'Deck 7',
        question: '<b>Hello</b>',
        answer: 'Yes',
        patientInfo: 'Jane Doe',
        isMulti: true,
        sources: ['Harrison ch. 3'],
      }),
      makeCard({
        id: '2',
        deckTitle: 'Deck 7',
        question: 'Which rhythm?',
        answer: '<p>Sinus</p>',
        freetext: true,
        patientInfo: 'Jane Doe',
      }),
    ],
  });

  test('MCQ answers are escaped in the field and read back as text by the back template', () => {
    const card = makeCard({ id: '8', answer: 'Na+ & K+ ||| Ca2+ < Mg2+' });
    expect(noteFields(card)[1]).toBe('Na+ &amp; K+ ||| Ca2+ &lt; Mg2+');
    expect(MCQ_MODEL.afmt).toContain('<div id="correct-answers" style="display:none">{{CorrectAnswer}}</div>');
    expect(MCQ_MODEL.afmt).not.toContain('"{{CorrectAnswer}}"');
  });

  test('checksums the stripped first field', () => {
    expect(fieldChecksum('<b>Hello</b>')).toBe(4160724619);
  });

  test('writes a collection database and an empty media map', async () => {
    const { archive, notes } = await buildPackage(decks, { now: () => now });
    expect(notes).toBe(2);

    const zip = await JSZip.loadAsync(archive);
    expect(Object.keys(zip.files).sort()).toEqual(['collection.anki2', 'media']);
    expect(await zip.file('media')?.async('string')).toBe('{}');

    const bytes = await zip.file('collection.anki2')?.async('uint8array');
    const SQL = await initSqlJs();
    const db = new SQL.Database(bytes);
    try {
      expect(rows(db.exec('SELECT id, mid, tags, flds, sfld, csum FROM notes ORDER BY id'))).toEqual([
        [
          now,
          1607392319001,
          ' Deck_Deck_7 Patient_Jane_Doe ',
          ['<b>Hello</b>', 'Yes', '', '', '100%', '<ul><li>Harrison ch. 3</li></ul>', '1', '1'].join('\x1f'),
          'Hello',
          4160724619,
        ],
        [
          now + 2,
          1607392319002,
          ' Deck_Deck_7 Patient_Jane_Doe ',
          ['Which rhythm?', '<p>Sinus</p>', ''].join('\x1f'),
          'Which rhythm?',
          3136462703,
        ],
      ]);

      expect(rows(db.exec('SELECT nid, did, due FROM cards ORDER BY id'))).toEqual([
        [now, DECK_ID_BASE, 0],
        [now + 2, DECK_ID_BASE, 1],
      ]);

      const [[version, modelsJson, decksJson]] = rows(db.exec('SELECT ver, models, decks FROM col'));
      expect(version).toBe(11);
      const models: unknown = JSON.parse(String(modelsJson));
      const deckEntries: unknown = JSON.parse(String(decksJson));
      expect(models).toMatchObject({
        '1607392319001': { name: 'MCQ Q&A', did: DECK_ID_BASE },
        '1607392319002': { name: 'FreeText Q&A' },
      });
      expect(deckEntries).toMatchObject({
        '1': { name: 'Default' },
        [String(DECK_ID_BASE)]: { name: 'Deck 7::Jane Doe' },
      });
    } finally {
      db.close();
    }
  });

  test('writePackage creates the output directory', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'cards-export-'));
    try {
      const path = join(dir, 'nested', 'Deck_7.apkg');
      const summary = await writePackage(decks, path, { now: () => now });
      expect(summary).toEqual({ path, decks: 1, notes: 2 });
      const written = await readFile(path);
      expect(written.subarray(0, 2).toString('latin1')).toBe('PK');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
