/**
 * inspector-bridge: serve an embedded database to a remote inspection client.
 * @example
 * import { createInspector, memoryDatabase, memorySource } from "inspector-bridge";
 * const db = memoryDatabase();
 * db.createTable("Dog", { columns: { name: "STRING", age: "INTEGER" } }).insert({ name: "Rex", age: 3 });
 * const inspector = createInspector({ source: memorySource({ main: db }) });
 */
export { classify, isNativeFieldType } from './core/classify.js';
export {
	formatDate,
	formatFloatingPoint,
	formatLinkList,
	formatListElement,
	formatNullable,
	formatUnknown,
	formatValue,
	formatValueList,
	INVALID_DATE,
	NULL_SENTINEL,
	TRUNCATED_SENTINEL
} from './core/format.js';
export { flattenRows, type FlattenOptions } from './core/flatten.js';
export { executeQuery, responseForOutcome, QUERY_ERROR_CODE, ROW_INDEX_COLUMN, type ExecuteQueryRequest } from './core/dispatch.js';
export { createInspector, type Inspector, type InspectorConfig } from './server/createInspector.js';
export { DEFAULT_LIMIT, inspectorOptionsSchema, resolveOptions, type InspectorOptions, type ResolvedInspectorOptions } from './server/options.js';
export { MemoryDatabase, MemoryTable, memoryDatabase, memorySource, shortestFloat, type CellInput, type ColumnSpec, type TableSpec } from './adapters/memory.js';
export { sqliteSource, type SqliteSourceOptions } from './adapters/sqlite.js';
export { toWireResponse, toWireValue, toWireValues, type WireExecuteQueryResponse, type WireValue } from './shared/serializer.js';
export * from './shared/errors.js';
export * from './shared/types.js';
