export type {
  Offset,
  Cell,
  BoardView,
  TourStep,
  TourResult,
  NextCellSelection,
  AttemptSummary,
  TourSearchResult,
} from './tour-types.js';

export type {
  DebugConfig,
  LogLevel,
  OutputFormat,
  GlobalConfig,
} from './global-config.js';

export * from './schemas.js';
