export { parseSelection, createSelectionParser } from './parser.js';
export {
  parseQueryArg,
  createSelectionParsers,
  readFieldSelection,
} from './query.js';
export type { SelectionParsers } from './query.js';
export type { FieldSelection, SelectionParser } from './types.js';
