export { Document } from './document';
export { extractTables, rowCells, rowText, tableText } from './tables';
export type { Table, TableRow } from './tables';
export { extractKeyValuePairs } from './key-values';
export {
  collapseWhitespace,
  compact,
  compactAttributes,
  nextElementSibling,
  parentElement,
  textOf,
} from './text';
