export {
  TourSearch,
  searchTour,
  DEFAULT_DIMENSION,
  DEFAULT_MAX_ATTEMPTS,
  type TourSearchOptions,
  type TourSearchEvents,
} from './TourSearch.js';
export {
  createDefaultRandomSource,
  createSeededRandomSource,
  randomStart,
  type RandomSource,
} from './random-source.js';
