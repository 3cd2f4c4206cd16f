export { AssignmentImporter, ROW_NOT_SAVED_MESSAGE, summarize } from './importer';
export type { ImporterDeps, ImporterDefaults } from './importer';
export { decodeSource, parseDelimited } from './delimited';
export type { DelimitedRow, DelimitedTable } from './delimited';
