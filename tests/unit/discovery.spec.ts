import { test, expect } from '@playwright/test';
import {
  createPatientStrategy,
  createPrintdeckStrategy,
  createSequentialStrategy,
  discoverDeck,
  parseCollectionDecks,
  parseCollectionTitle,
  parseDeckDetails,
  parseExpectedQuestions,
  parsePrintdeckIds,
  type DiscoveryStrategy,
} from '../../src/discovery';
import { iterationCap } from '../../src/discovery/sequential_strategy';
import { DiscoveryError } from '../../src/errors';
import type { DeckRef } from '../../src/extraction/types';
import { FakeSite, TEST_HOST } from '../support/fake_site';

const deck: DeckRef = { host: TEST_HOST, deckId: '7', bagId: '3', title: 'Cardiology' };

const FAST = { waitTimeoutMs: 20 };

function sequentialCard(next: string): string {
  return (
    '<html><body><div id="workspace"><div class="solution container"><form><h3>Q</h3>' +
    '<button type="submit">Submit</button></form></div>' +
    `<a id="next" href="${next}">Next</a></div></body></html>`
  );
}

function detailsPage(counter: string, patients = ''): string {
  return `<html><body><div class="deck-details">${counter}</div>${patients}</body></html>`;
}

test.describe('Deck details', () => {
  test('takes the last non-zero counter total', () => {
    expect(parseExpectedQuestions('Correct: 0 of 0 ... Correct: 2 of 12')).toBe(12);
  });

  test('defaults when there is no counter', () => {
    expect(parseExpectedQuestions('No progress yet')).toBe(5);
  });

  test('reads patient names and entries', () => {
    const details = parseDeckDetails(
      '<div class="patients"><div class="patient" rel="31"><h3>Jane Doe</h3></div><div class="patient" rel="32"></div></div>'
    );
    expect(details.patients).toEqual(['Jane Doe']);
    expect(details.patientEntries).toEqual([
      { rel: '31', name: 'Jane Doe' },
      { rel: '32', name: 'Patient 32' },
    ]);
  });

  test('falls back to Unknown Patient', () => {
    expect(parseDeckDetails('<p>Nothing</p>').patients).toEqual(['Unknown Patient']);
  });
});

test.describe('Printdeck strategy', () => {
  test('lists ids in page order without duplicates', () => {
    const html =
      '<div class="submit"><button rel="/solution/11/">A</button></div>' +
      '<div class="submit"><button rel="/solution/12/">B</button></div>' +
      '<div class="submit"><button rel="/solution/11/">A again</button></div>';
    expect(parsePrintdeckIds(html)).toEqual(['11', '12']);
  });

  test('returns null when access is denied', async () => {
    const site = new FakeSite({
      '/printdeck/7': { html: '<html><body>Access denied</body></html>', title: 'Error 403' },
    });
    const result = await createPrintdeckStrategy(FAST).discover(site, {
      deck,
      details: parseDeckDetails(''),
    });
    expect(result).toBeNull();
    expect(site.visits).toEqual(['/printdeck/7?bag_id=3']);
  });

  test('applies the card limit', async () => {
    const site = new FakeSite({
      '/printdeck/7': {
        html:
          '<html><body><div class="submit"><button rel="/solution/11/">A</button></div>' +
          '<div class="submit"><button rel="/solution/12/">B</button></div></body></html>',
      },
    });
    const result = await createPrintdeckStrategy(FAST).discover(site, {
      deck,
      details: parseDeckDetails(''),
      limit: 1,
    });
    expect(result).toEqual({ method: 'printdeck', cardIds: ['11'], patients: [], isSequential: false });
  });
});

test.describe('Sequential strategy', () => {
  test('stops when the walk loops back', async () => {
    const site = new FakeSite({
      '/deck/7': { html: '', redirectTo: '/card/101' },
      '/card/101': { html: sequentialCard('/card/102') },
      '/card/102': { html: sequentialCard('/card/103') },
      '/card/103': { html: sequentialCard('/card/101') },
    });
    const result = await createSequentialStrategy(FAST).discover(site, {
      deck,
      details: parseDeckDetails('Correct: 0 of 10'),
    });
    expect(result).toEqual({
      method: 'sequential',
      cardIds: ['101', '102', '103'],
      patients: ['Sequential Deck', 'Sequential Deck', 'Sequential Deck'],
      isSequential: true,
    });
  });

  test('never visits the card after the expected count', async () => {
    const site = new FakeSite({
      '/deck/7': { html: '', redirectTo: '/card/201' },
      '/card/201': { html: sequentialCard('/card/202') },
      '/card/202': { html: sequentialCard('/card/203') },
      '/card/203': { html: sequentialCard('/card/204') },
      '/card/204': { html: sequentialCard('/card/205') },
      '/card/205': { html: sequentialCard('/card/201') },
    });
    const result = await createSequentialStrategy(FAST).discover(site, {
      deck,
      details: parseDeckDetails('Correct: 0 of 3'),
    });
    expect(result?.cardIds).toEqual(['201', '202', '203']);
    expect(site.visits).not.toContain('/card/204');
  });

  test('an entry page without a card id is walked past', async () => {
    const site = new FakeSite({
      '/deck/7': { html: sequentialCard('/card/102') },
      '/card/102': { html: sequentialCard('/card/103') },
      '/card/103': { html: sequentialCard('/card/102') },
    });
    const result = await createSequentialStrategy(FAST).discover(site, {
      deck,
      details: parseDeckDetails('Correct: 0 of 10'),
    });
    expect(result?.cardIds).toEqual(['102', '103']);
    expect(site.visits).toEqual(['/deck/7?timer-enabled=1&mode=sequential', '/card/102', '/card/103', '/card/102']);
  });

  test('the iteration cap ends a walk that neither loops nor reaches the count', async () => {
    const site = new FakeSite({
      '/deck/7': { html: '', redirectTo: '/card/401' },
      '/card/401': { html: sequentialCard('/lobby') },
      '/lobby': { html: '<html><body><a id="next" href="/lobby">Next</a></body></html>' },
    });
    const result = await createSequentialStrategy(FAST).discover(site, {
      deck,
      details: parseDeckDetails('No progress yet'),
    });
    expect(result?.cardIds).toEqual(['401']);
    expect(iterationCap(5)).toBe(50);
    expect(site.visits).toHaveLength(1 + iterationCap(5));
    expect(site.visits.slice(1).every((visit) => visit === '/lobby')).toBe(true);
  });

  test('the limit caps the expected count', async () => {
    const site = new FakeSite({
      '/deck/7': { html: '', redirectTo: '/card/301' },
      '/card/301': { html: sequentialCard('/card/302') },
      '/card/302': { html: sequentialCard('/card/303') },
    });
    const result = await createSequentialStrategy(FAST).discover(site, {
      deck,
      details: parseDeckDetails('Correct: 0 of 10'),
      limit: 2,
    });
    expect(result?.cardIds).toEqual(['301', '302']);
  });
});

test.describe('Per-patient strategy', () => {
  const details = parseDeckDetails(
    '<div class="patients">' +
      '<div class="patient" rel="31"><h3>Jane Doe</h3></div>' +
      '<div class="patient" rel="32"><h3>John Roe</h3></div>' +
      '<div class="patient" rel="33"><h3>Sam Poe</h3></div>' +
      '</div>'
  );

  function patientSite(): FakeSite {
    return new FakeSite({
      '/patient/31': { html: '<html><body><a href="/card/301">Start case</a></body></html>' },
      '/patient/32': { html: `<html><body><button onclick="location.href='/card/302'">Open</button></body></html>` },
      '/patient/33': { html: '<html><body><p>Nothing here</p></body></html>' },
    });
  }

  test('pairs each card with the patient that produced it', async () => {
    const result = await createPatientStrategy(FAST).discover(patientSite(), { deck, details });
    expect(result).toEqual({
      method: 'per-patient',
      cardIds: ['301', '302'],
      patients: ['Jane Doe', 'John Roe'],
      isSequential: false,
    });
  });

  test('the limit applies to patients', async () => {
    const site = patientSite();
    const result = await createPatientStrategy(FAST).discover(site, { deck, details, limit: 1 });
    expect(result?.cardIds).toEqual(['301']);
    expect(result?.patients).toEqual(['Jane Doe']);
    expect(site.visits).toEqual(['/patient/31']);
  });
});

test.describe('Discovery coordinator', () => {
  const site = () => new FakeSite({ '/details/7': { html: detailsPage('Correct: 0 of 4') } });

  function strategy(method: DiscoveryStrategy['method'], run: DiscoveryStrategy['discover']): DiscoveryStrategy {
    return { method, discover: run };
  }

  test('moves past strategies that throw or find nothing', async () => {
    const { details, result } = await discoverDeck(site(), deck, {
      ...FAST,
      strategies: [
        strategy('printdeck', async () => {
          throw new Error('page crashed');
        }),
        strategy('sequential', async () => null),
        strategy('per-patient', async () => ({
          method: 'per-patient',
          cardIds: ['9'],
          patients: ['Jane Doe'],
          isSequential: false,
        })),
      ],
    });
    expect(details.expectedQuestions).toBe(4);
    expect(result.method).toBe('per-patient');
    expect(result.cardIds).toEqual(['9']);
  });

  test('throws DiscoveryError naming every strategy tried', async () => {
    const error = await discoverDeck(site(), deck, {
      ...FAST,
      strategies: [strategy('printdeck', async () => null), strategy('sequential', async () => null)],
    }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(DiscoveryError);
    expect(error instanceof DiscoveryError ? error.details : undefined).toEqual({
      deckId: '7',
      tried: ['printdeck', 'sequential'],
    });
  });
});

test.describe('Collection listing', () => {
  const html =
    '<html><head><title>RIME 1.1.3 | Cards</title></head><body><h1>RIME 1.1.3</h1>' +
    '<a href="/details/41?bag_id=9">Chest Pain</a>' +
    '<a href="/details/42">Syncope</a>' +
    '<a href="/details/41?bag_id=9">Chest Pain</a>' +
    '</body></html>';

  test('lists decks once each', () => {
    expect(parseCollectionDecks(html, TEST_HOST, '5').map((info) => [info.deckId, info.bagId, info.title])).toEqual([
      ['41', '9', 'Chest Pain'],
      ['42', '5', 'Syncope'],
    ]);
  });

  test('reads the collection title', () => {
    expect(parseCollectionTitle(html, '5')).toBe('RIME 1.1.3');
  });
});
