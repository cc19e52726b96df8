/**
 * UI utilities for terminal output — re-export hub.
 *
 * - LogManager.ts: Log level management and formatted output
 * - BoardRenderer.ts: Marker grid and cell formatting
 */

export {
  LogManager,
  setLogLevel,
  blankLine,
  print,
  debug,
  info,
  warn,
  error,
  success,
  section,
  status,
  list,
} from './LogManager.js';

export { formatBoardRows, formatCell, formatPath, renderBoard } from './BoardRenderer.js';
