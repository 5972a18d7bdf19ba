import type { Card } from '../../src/extraction/types';

/**
 * A finished card with every field filled in; override what the test is about.
 */
export function makeCard(overrides: Partial<Card> & Pick<Card, 'id'>): Card {
  return {
    question: `<div class="question"><b>Question ${overrides.id}</b></div>`,
    answer: 'Answer',
    explanation: '',
    background: '',
    patientInfo: 'Unknown Patient',
    isMulti: false,
    freetext: false,
    isSequential: false,
    tags: [],
    scoreText: '',
    percent: '100%',
    deckTitle: 'Cardiology',
    sources: [],
    options: [],
    ...overrides,
  };
}
