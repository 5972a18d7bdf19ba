import { UNKNOWN_PATIENT, type Card } from './types';

/**
 * Patient label for the card at `index`. When the patient list matches the
 * card list one to one the labels pair up by position; otherwise they
 * repeat round-robin.
 */
export function patientForIndex(patients: readonly string[], cardCount: number, index: number): string {
  if (patients.length === 0) {
    return UNKNOWN_PATIENT;
  }
  if (patients.length === cardCount) {
    return patients[index];
  }
  return patients[index % patients.length];
}

/**
 * Put extracted cards back in discovery order and give a patient label to
 * every card that is still unlabelled. Labels follow the card's position
 * among the discovered ids, so a card that failed to extract does not shift
 * the cards after it. Sequential cards and cards already labelled keep
 * their label.
 */
export function backfillPatients(
  cardIds: readonly string[],
  cards: ReadonlyMap<string, Card>,
  patients: readonly string[]
): Card[] {
  return cardIds.flatMap((cardId, index) => {
    const card = cards.get(cardId);
    if (!card) {
      return [];
    }
    if (card.isSequential || card.patientInfo !== UNKNOWN_PATIENT) {
      return [card];
    }
    return [{ ...card, patientInfo: patientForIndex(patients, cardIds.length, index) }];
  });
}
