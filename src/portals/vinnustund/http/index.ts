export {
  extractHiddenFields,
  extractFormAction,
  isLoginLocation,
  detectExpiry
} from './form-parser.js';

export {
  parseShiftTable,
  normalizeCellText,
  type ShiftTableParserOptions
} from './shift-table-parser.js';
