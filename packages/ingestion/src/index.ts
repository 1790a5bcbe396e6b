export {
  atRow,
  findMissingColumns,
  parseCsvContent,
  readCsvFile,
  type CsvTable,
} from './csv/csv-parser-utils.js';
export {
  REQUIRED_TRANSACTION_COLUMNS,
  applySplit,
  loadTransactions,
  parseTransactionTable,
  type TransactionLoadOptions,
} from './transactions/transaction-loader.js';
export {
  REFERENCE_COLUMNS,
  loadReference,
  parseReferenceTable,
  resolveReferencePath,
  type ReferenceDatasetLocator,
} from './reference/reference-loader.js';
export { sortByDate } from './shared/record-utils.js';
