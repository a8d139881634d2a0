export { loadConfig, type AppConfig } from './config';
export { selectSources, type SelectionPlan } from './core/selection';
export { runFetches } from './core/fetch';
export { calculateCdiDailyPercent } from './core/rates';
export { SOURCES, SOURCE_KEYS } from './core/sources';
export * from './errors';
export { createHttpClient, type HttpClient } from './http/client';
export { applyLedgerUpdate, type LedgerUpdateInput, type WriteReport } from './ledger/update';
export { createLedgerFile, normalizeLedgerLayout, readLedgerSnapshot, updateLedgerFile } from './ledger/workbook';
export { regenerateCsvRow } from './ledger/csv';
export { validateRowConsistency } from './ledger/consistency';
export { copyDirectoryToNetwork, parseNetworkDirs, selectReferenceLedgerPath, syncLocalFromReference } from './network/sync';
export { tryToUnc } from './network/unc';
export { formatPtBrDecimal, parsePtBrDecimal, quantize } from './parsers/decimal';
export { createSourceFetchers } from './services/client';
export { runQuotes } from './jobs/run-quotes';
export type * from './types';
