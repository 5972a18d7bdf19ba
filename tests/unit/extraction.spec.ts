import { test, expect } from '@playwright/test';
import { load } from 'cheerio';
import { ExtractionError } from '../../src/errors';
import { buildCard, computePercent, correctOptionTexts, renderOptions } from '../../src/extraction/card_builder';
import { assembleCard, BrowserCardExtractor } from '../../src/extraction/card_extractor';
import { cardTextLength, isFreetextPage, parseCardPage } from '../../src/extraction/card_page';
import { backfillPatients, patientForIndex } from '../../src/extraction/patient_assignment';
import { buildSolutionForm, parseSolutionResponse, type Solution } from '../../src/extraction/solution_client';
import type { Card } from '../../src/extraction/types';
import { FakeHttpClient, FakeSite, htmlResponse, jsonResponse, mcqPage, TEST_HOST } from '../support/fake_site';

const CHEST_PAIN_OPTIONS = [
  { id: 'a1', text: 'Angina' },
  { id: 'a2', text: 'Pericarditis &amp; effusion' },
  { id: 'a3', text: 'Gout' },
  { id: 'a4', text: 'Cataract' },
];

const noSolution: Solution = { answers: [], feedback: '', scoreText: '', score: null };

test.describe('Card page parsing', () => {
  test('reads question, options and multi-select flag', () => {
    const page = parseCardPage(mcqPage('Which are causes of chest pain?', CHEST_PAIN_OPTIONS, { multi: true }), '55');
    expect(page.question).toBe('Which are causes of chest pain?');
    expect(page.options).toEqual([
      { id: 'a1', text: 'Angina' },
      { id: 'a2', text: 'Pericarditis & effusion' },
      { id: 'a3', text: 'Gout' },
      { id: 'a4', text: 'Cataract' },
    ]);
    expect(page.isMulti).toBe(true);
    expect(isFreetextPage(page)).toBe(false);
  });

  test('names the patient from its link', () => {
    const named = parseCardPage(mcqPage('Q', [], { patientLink: '<a href="/patient/31">Jane Doe</a>' }), '1');
    const unnamed = parseCardPage(mcqPage('Q', [], { patientLink: '<a href="/patient/44"></a>' }), '1');
    expect(named.patientInfo).toBe('Jane Doe');
    expect(unnamed.patientInfo).toBe('Patient 44');
  });

  test('measures the workspace text', () => {
    expect(cardTextLength('<html><body><div id="workspace"> Hello   world </div><p>ignored</p></body></html>')).toBe(11);
  });
});

test.describe('Card building', () => {
  test('multi-answer cards join correct options and keep input ids unique', () => {
    const page = parseCardPage(mcqPage('Which are causes of chest pain?', CHEST_PAIN_OPTIONS, { multi: true }), '55');
    const card = buildCard(
      { page, background: '', images: '', solution: { ...noSolution, answers: ['a1', 'a2'] } },
      { deckTitle: 'Cardiology', isSequential: false }
    );

    expect(card.answer).toBe('Angina ||| Pericarditis & effusion');
    expect(card.question.match(/id="choice_55_\d"/g)).toEqual([
      'id="choice_55_0"',
      'id="choice_55_1"',
      'id="choice_55_2"',
      'id="choice_55_3"',
    ]);
    expect(card.question.startsWith('<div class="question"><b>Which are causes of chest pain?</b></div>')).toBe(true);
    expect(card.isMulti).toBe(true);
    expect(card.percent).toBe('100%');
    expect(card.patientInfo).toBe('Unknown Patient');
    expect(card.tags).toEqual([]);
  });

  test('the answer holds the same text the option inputs carry', () => {
    const page = parseCardPage(mcqPage('Which ions does the pump move?', [
      { id: 'i1', text: 'Na+ &amp; K+' },
      { id: 'i2', text: 'Ca2+ &lt; Mg2+' },
    ]), '60');
    const card = buildCard(
      { page, background: '', images: '', solution: { ...noSolution, answers: ['i1', 'i2'] } },
      { deckTitle: 'Cardiology', isSequential: false }
    );

    const $ = load(card.question);
    const values = $('.option input')
      .toArray()
      .map((input) => $(input).attr('value'));
    expect(values).toEqual(['Na+ & K+', 'Ca2+ < Mg2+']);
    expect(card.answer.split(' ||| ')).toEqual(values);
  });

  test('renders checkboxes for multi-select', () => {
    expect(renderOptions('9', [{ id: 'x', text: 'A "quoted" <b>' }], true)).toBe(
      '<div class="option"><input type="checkbox" name="choice" id="choice_9_0" value="A &quot;quoted&quot; &lt;b&gt;">' +
        '<label for="choice_9_0">A "quoted" &lt;b&gt;</label></div>'
    );
  });

  test('the first option stands in when the solution names none', () => {
    expect(correctOptionTexts([{ id: '1', text: 'First' }, { id: '2', text: 'Second' }], ['99'])).toEqual(['First']);
  });

  test('free-text cards carry the feedback as their answer', () => {
    const html =
      '<html><body><div id="workspace"><div class="solution container"><form>' +
      '<h3>Describe the murmur.</h3><div class="freetext-answer"><textarea name="guess"></textarea></div>' +
      '</form></div></div></body></html>';
    const page = parseCardPage(html, '77');
    const card = buildCard(
      { page, background: '', images: '', solution: { ...noSolution, feedback: '<p>Harsh systolic murmur</p>' } },
      { deckTitle: 'Cardiology', isSequential: true }
    );

    expect(card.freetext).toBe(true);
    expect(card.isMulti).toBe(false);
    expect(card.answer).toBe('<p>Harsh systolic murmur</p>');
    expect(card.explanation).toBe('');
    expect(card.question).toBe(
      '<div class="question"><b>Describe the murmur.</b></div><div class="freetext-answer"><textarea name="guess"></textarea></div>'
    );
    expect(card.patientInfo).toBe('Sequential Deck');
    expect(card.tags).toEqual(['Sequential_Extraction']);
  });

  test('percent prefers the numeric score, then the score text', () => {
    expect(computePercent({ ...noSolution, score: 75 }, [])).toBe('75%');
    expect(computePercent({ ...noSolution, score: 0, scoreText: 'You scored 40% ' }, [])).toBe('40%');
    expect(computePercent({ ...noSolution, answers: ['x'] }, [{ id: 'y', text: 'Y' }])).toBe('0%');
  });
});

test.describe('Solution responses', () => {
  const url = `${TEST_HOST}/solution/5/`;

  test('parses numeric and string values', () => {
    const result = parseSolutionResponse(
      jsonResponse(url, { answers: [3, '4'], feedback: 'Good', scoreText: '1/1', score: '100' }),
      'empty'
    );
    expect(result).toEqual({
      kind: 'solution',
      payload: 'empty',
      solution: { answers: ['3', '4'], feedback: 'Good', scoreText: '1/1', score: 100 },
    });
  });

  test('HTML or a login redirect means the session is gone', () => {
    expect(parseSolutionResponse(htmlResponse(url, '<html></html>'), 'empty').kind).toBe('auth');
    expect(parseSolutionResponse(htmlResponse(`${TEST_HOST}/login?next=/solution/5/`, 'x'), 'empty').kind).toBe('auth');
  });

  test('other failures are invalid', () => {
    expect(parseSolutionResponse(htmlResponse(url, 'oops', 500), 'empty')).toEqual({
      kind: 'invalid',
      payload: 'empty',
      status: 500,
      reason: 'HTTP 500',
    });
    expect(parseSolutionResponse(htmlResponse(url, 'not json'), 'empty')).toEqual({
      kind: 'invalid',
      payload: 'empty',
      status: 200,
      reason: 'body is not JSON',
    });
  });

  test('the all-options payload guesses every option', () => {
    expect(
      buildSolutionForm('all-options', [
        { id: 'a1', text: 'A' },
        { id: 'a2', text: 'B' },
      ])
    ).toEqual([
      ['guess[]', 'a1'],
      ['guess[]', 'a2'],
      ['timer', '2'],
    ]);
  });
});

test.describe('Card assembly', () => {
  const imagePage =
    '<html><body><div id="workspace"><div class="solution container"><form rel="pickone"><h3>What rhythm is shown?</h3>' +
    '<div class="options"><div class="option"><input value="r1"><label>Sinus rhythm</label></div></div>' +
    '</form></div></div><div class="container card"><img src="/uploads/card/ecg.png" alt="ECG"></div></body></html>';

  test('embeds page and feedback images as data URLs', async () => {
    const http = new FakeHttpClient({
      [`${TEST_HOST}/uploads/card/ecg.png`]: ({ url }) => ({
        status: 200,
        url,
        contentType: 'image/png',
        body: Buffer.from('png-bytes'),
      }),
    });
    const outcome = await assembleCard(
      imagePage,
      '12',
      { deckTitle: 'Cardiology', isSequential: false },
      {
        http,
        host: TEST_HOST,
        solve: async () => ({ ...noSolution, answers: ['r1'], feedback: '<p>See <img src="/uploads/card/ecg.png"></p>' }),
      }
    );

    expect(outcome.kind).toBe('card');
    const card = outcome.kind === 'card' ? outcome.card : null;
    expect(card?.background).toBe(
      '<div class="extracted-images"><img src="data:image/png;base64,cG5nLWJ5dGVz" alt="ECG"></div>'
    );
    expect(card?.explanation).toBe('<p>See <img src="data:image/png;base64,cG5nLWJ5dGVz"></p>');
    expect(card?.answer).toBe('Sinus rhythm');
  });

  test('a page with no question and no background is empty', async () => {
    const outcome = await assembleCard(
      '<html><body><div id="workspace"></div></body></html>',
      '1',
      { deckTitle: 'Cardiology', isSequential: false },
      {
        http: new FakeHttpClient(),
        host: TEST_HOST,
        solve: async () => {
          throw new Error('should not be asked');
        },
      }
    );
    expect(outcome).toEqual({ kind: 'empty', cardId: '1' });
  });

  test('without a solution the first option becomes the answer', async () => {
    const http = new FakeHttpClient();
    const outcome = await assembleCard(
      mcqPage('Pick one', [
        { id: 'a1', text: 'First' },
        { id: 'a2', text: 'Second' },
      ]),
      '3',
      { deckTitle: 'Cardiology', isSequential: false },
      { http, host: TEST_HOST }
    );

    expect(outcome.kind === 'card' ? outcome.card.answer : null).toBe('First');
    expect(outcome.kind === 'card' ? outcome.card.percent : null).toBe('0%');
    expect(http.posts).toEqual([
      { url: `${TEST_HOST}/solution/3/`, fields: [['timer', '1']] },
      {
        url: `${TEST_HOST}/solution/3/`,
        fields: [
          ['guess[]', 'a1'],
          ['guess[]', 'a2'],
          ['timer', '2'],
        ],
      },
    ]);
  });
});

test.describe('Patient assignment', () => {
  const card = (id: string, patientInfo: string, isSequential = false): Card => ({
    id,
    question: '',
    answer: '',
    explanation: '',
    background: '',
    patientInfo,
    isMulti: false,
    freetext: false,
    isSequential,
    tags: [],
    scoreText: '',
    percent: '',
    deckTitle: 'Cardiology',
    sources: [],
    options: [],
  });

  test('pairs one to one, else round-robin', () => {
    expect(patientForIndex(['A', 'B'], 2, 1)).toBe('B');
    expect(patientForIndex(['A', 'B'], 3, 2)).toBe('A');
    expect(patientForIndex([], 3, 2)).toBe('Unknown Patient');
  });

  const byId = (...cards: Card[]): Map<string, Card> => new Map(cards.map((item) => [item.id, item]));

  test('only unlabelled cards are backfilled', () => {
    const cards = backfillPatients(
      ['1', '2', '3'],
      byId(card('1', 'Unknown Patient'), card('2', 'Jane Doe'), card('3', 'Sequential Deck', true)),
      ['A', 'B', 'C']
    );
    expect(cards.map((item) => item.patientInfo)).toEqual(['A', 'Jane Doe', 'Sequential Deck']);
  });

  test('a card that failed to extract does not shift the labels after it', () => {
    const cards = backfillPatients(
      ['1', '2', '3'],
      byId(card('3', 'Unknown Patient'), card('1', 'Unknown Patient')),
      ['A', 'B', 'C']
    );
    expect(cards.map((item) => [item.id, item.patientInfo])).toEqual([
      ['1', 'A'],
      ['3', 'C'],
    ]);
  });
});

test.describe('Browser extraction', () => {
  /** Every navigation fails the way a dropped connection does */
  class UnreachableSite extends FakeSite {
    async goto(url: string): Promise<void> {
      throw new Error(`net::ERR_CONNECTION_RESET at ${url}`);
    }
  }

  test('a card page that cannot load is reported as an extraction failure', async () => {
    const extractor = new BrowserCardExtractor(new UnreachableSite(), new FakeHttpClient(), {
      host: TEST_HOST,
      readyTimeoutMs: 20,
    });

    const outcome = await extractor.extract('9', { deckTitle: 'Cardiology', isSequential: false });

    expect(outcome).toMatchObject({ kind: 'failed', cardId: '9' });
    const failure = outcome.kind === 'failed' ? outcome.error : null;
    expect(failure).toBeInstanceOf(ExtractionError);
    expect(failure?.code).toBe('EXTRACTION_FAILED');
    expect(failure?.message).toBe('Could not load card 9: net::ERR_CONNECTION_RESET at https://cards.test/card/9');
    expect(failure?.details).toEqual({ cardId: '9', url: 'https://cards.test/card/9' });
  });
});
