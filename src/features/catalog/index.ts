export { showMoves, formatOffset } from './showMoves.js';
