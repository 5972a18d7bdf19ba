/**
 * Deck hierarchy and tags for the exported package.
 *
 * Single deck:           Deck::Patient, or "Deck (Sequential Deck)"
 * Curriculum collection: BASE::Block X::Unit Y::Week Z::Deck::Patient,
 *                        or ...::Deck (Sequential)
 * Other collection:      Collection::Deck::Patient, or Collection::Deck (Sequential)
 */

import { v5 as uuidv5 } from 'uuid';
import { UNKNOWN_PATIENT, type Card } from '../extraction/types';

// ============================================================================
// Types
// ============================================================================

export const DECK_ID_BASE = 1607392319000;

const GUID_NAMESPACE = '5b0d8f3e-6c1a-4f7e-9d2b-8a4c3e1f7b60';

const CURRICULUM_NAME = /^([A-Z][A-Z\s]+)\s+(\d+)\.(\d+)\.(\d+)$/;

export type ExportMode = 'single' | 'collection';

export interface CurriculumInfo {
  base: string;
  block: string;
  unit: string;
  week: string;
}

export interface PlannedNote {
  card: Card;
  tags: string[];
  /** Stable across exports of the same card in the same deck */
  guid: string;
}

export interface PlannedDeck {
  id: number;
  name: string;
  notes: PlannedNote[];
}

export interface DeckTreeInput {
  mode: ExportMode;
  /** Collection title, or the fallback name of a single deck */
  name: string;
  cards: readonly Card[];
}

type GroupKey = { kind: 'patient'; patient: string } | { kind: 'sequential' };

// ============================================================================
// Naming
// ============================================================================

/**
 * Parse a curriculum-style collection name such as "RIME 1.1.3".
 */
export function detectCurriculum(name: string): CurriculumInfo | null {
  const match = CURRICULUM_NAME.exec(name.trim().toUpperCase());
  if (!match) {
    return null;
  }
  return { base: match[1].trim(), block: match[2], unit: match[3], week: match[4] };
}

export function tagSafe(value: string): string {
  return value.replace(/ /g, '_');
}

export function noteGuid(card: Card): string {
  return uuidv5(`${card.deckTitle}/${card.id}`, GUID_NAMESPACE);
}

function deckName(input: DeckTreeInput, deckTitle: string, key: GroupKey, curriculum: CurriculumInfo | null): string {
  if (input.mode === 'single') {
    return key.kind === 'sequential' ? `${deckTitle} (Sequential Deck)` : `${deckTitle}::${key.patient}`;
  }
  const prefix = curriculum
    ? `${curriculum.base}::Block ${curriculum.block}::Unit ${curriculum.unit}::Week ${curriculum.week}`
    : input.name;
  return key.kind === 'sequential' ? `${prefix}::${deckTitle} (Sequential)` : `${prefix}::${deckTitle}::${key.patient}`;
}

function noteTags(
  input: DeckTreeInput,
  card: Card,
  deckTitle: string,
  key: GroupKey,
  index: number,
  curriculum: CurriculumInfo | null
): string[] {
  const tags = [...card.tags];

  if (input.mode === 'collection') {
    if (curriculum) {
      tags.push(
        `Curriculum_${tagSafe(curriculum.base)}`,
        `Block_${curriculum.block}`,
        `Unit_${curriculum.unit}`,
        `Week_${curriculum.week}`
      );
    } else {
      tags.push(`Collection_${tagSafe(input.name)}`);
    }
  }

  tags.push(`Deck_${tagSafe(deckTitle)}`);

  if (key.kind === 'sequential') {
    tags.push('Sequential_Mode', `Question_${index + 1}`);
  } else {
    tags.push(`Patient_${tagSafe(key.patient)}`);
  }
  return tags;
}

// ============================================================================
// Planning
// ============================================================================

function groupKey(card: Card): GroupKey {
  return card.isSequential ? { kind: 'sequential' } : { kind: 'patient', patient: card.patientInfo || UNKNOWN_PATIENT };
}

function keyString(key: GroupKey): string {
  return key.kind === 'sequential' ? '\u0000sequential' : key.patient;
}

/**
 * Group cards into leaf decks, in first-seen order, and assign deck ids
 * counting up from DECK_ID_BASE. In a single-deck export the sequential
 * leaf comes first.
 */
export function planDecks(input: DeckTreeInput): PlannedDeck[] {
  const curriculum = input.mode === 'collection' ? detectCurriculum(input.name) : null;
  const singleTitle = input.cards[0]?.deckTitle || input.name;

  const groups = new Map<string, { deckTitle: string; key: GroupKey; cards: Card[] }>();
  for (const card of input.cards) {
    const deckTitle = input.mode === 'single' ? singleTitle : card.deckTitle;
    const key = groupKey(card);
    const id = `${deckTitle}\u0000${keyString(key)}`;
    const group = groups.get(id);
    if (group) {
      group.cards.push(card);
    } else {
      groups.set(id, { deckTitle, key, cards: [card] });
    }
  }

  let ordered = Array.from(groups.values());
  if (input.mode === 'single') {
    ordered = [
      ...ordered.filter((group) => group.key.kind === 'sequential'),
      ...ordered.filter((group) => group.key.kind !== 'sequential'),
    ];
  }

  return ordered.map((group, position) => ({
    id: DECK_ID_BASE + position,
    name: deckName(input, group.deckTitle, group.key, curriculum),
    notes: group.cards.map((card, index) => ({
      card,
      tags: noteTags(input, card, group.deckTitle, group.key, index, curriculum),
      guid: noteGuid(card),
    })),
  }));
}
