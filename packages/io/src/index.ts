/**
 * @tabflow/io
 */

export { parseCsv, formatCsv, loadCsv, saveCsv, type CsvReadOptions, type CsvWriteOptions } from './csv.js';
export { parseJson, formatJson, loadJson, saveJson, JsonRecordsSchema } from './json.js';
export { inferScalar } from './infer.js';
