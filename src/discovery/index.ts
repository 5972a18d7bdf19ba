/**
 * Card discovery
 */

export {
  discoverDeck,
  defaultStrategies,
  type DeckDiscovery,
} from './coordinator';

export {
  readDeckDetails,
  parseDeckDetails,
  parseExpectedQuestions,
  DEFAULT_EXPECTED_QUESTIONS,
  type DeckDetails,
  type PatientEntry,
} from './deck_metadata';

export {
  createPrintdeckStrategy,
  parsePrintdeckIds,
  isPrintdeckDenied,
} from './printdeck_strategy';

export {
  createSequentialStrategy,
  cardIdFromUrl,
  iterationCap,
} from './sequential_strategy';

export {
  createPatientStrategy,
  findCardIdOnPatientPage,
} from './patient_strategy';

export {
  collectionUrl,
  readCollection,
  parseCollectionDecks,
  parseCollectionTitle,
  type CollectionListing,
} from './collection';

export {
  applyLimit,
  type DiscoveryMethod,
  type DiscoveryRequest,
  type DiscoveryResult,
  type DiscoveryStrategy,
  type StrategyOptions,
} from './strategy';
