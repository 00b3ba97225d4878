export type MaybePromise<T> = T | Promise<T>;

/** Native storage type identifiers an engine can report for a column. */
export const NATIVE_FIELD_TYPES = [
	'INTEGER',
	'BOOLEAN',
	'STRING',
	'BINARY',
	'UNSUPPORTED_TABLE',
	'UNSUPPORTED_MIXED',
	'UNSUPPORTED_DATE',
	'DATE',
	'FLOAT',
	'DOUBLE',
	'OBJECT',
	'LIST',
	'LINKING_OBJECTS',
	'INTEGER_LIST',
	'BOOLEAN_LIST',
	'STRING_LIST',
	'BINARY_LIST',
	'DATE_LIST',
	'FLOAT_LIST',
	'DOUBLE_LIST',
	'DECIMAL128',
	'OBJECT_ID',
	'UUID',
	'MIXED',
	'TYPED_LINK'
] as const;

export type NativeFieldType = (typeof NATIVE_FIELD_TYPES)[number];

export type LogicalFieldType =
	| 'INTEGER'
	| 'BOOLEAN'
	| 'STRING'
	| 'BINARY'
	| 'UNSUPPORTED_TABLE'
	| 'UNSUPPORTED_MIXED'
	| 'LEGACY_DATE'
	| 'DATE'
	| 'FLOAT'
	| 'DOUBLE'
	| 'OBJECT_LINK'
	| 'LINK_LIST'
	| 'INTEGER_LIST'
	| 'BOOLEAN_LIST'
	| 'STRING_LIST'
	| 'BINARY_LIST'
	| 'DATE_LIST'
	| 'FLOAT_LIST'
	| 'DOUBLE_LIST'
	| 'UNKNOWN';

export type ColumnKey = number;

export type Column = {
	name: string;
	/** Native identifier as reported by the engine; not necessarily a known NativeFieldType. */
	type: string;
	key: ColumnKey;
};

/** Element of a scalar-valued list column, as the container reports it. */
export type ListValue = number | boolean | string | Uint8Array | Date | null;

export interface LinkList {
	readonly targetTableName: string;
	size(): number;
	getObjectKey(position: number): number;
}

export interface ValueList {
	size(): number;
	getValue(position: number): ListValue;
}

export interface Row {
	/** Stable across calls and traversal directions, unlike the ordinal. */
	readonly objectKey: number;
	isNull(columnKey: ColumnKey): boolean;
	isNullLink(columnKey: ColumnKey): boolean;
	getLong(columnKey: ColumnKey): number;
	getBoolean(columnKey: ColumnKey): boolean;
	getFloat(columnKey: ColumnKey): number;
	getDouble(columnKey: ColumnKey): number;
	getString(columnKey: ColumnKey): string;
	getBinary(columnKey: ColumnKey): Uint8Array;
	getDate(columnKey: ColumnKey): Date;
	getLink(columnKey: ColumnKey): number;
	getLinkList(columnKey: ColumnKey): LinkList;
	getValueList(columnKey: ColumnKey): ValueList;
}

export interface Table {
	readonly name: string;
	columns(): readonly Column[];
	size(): number;
	/** 0-based physical ordinal; callers never pass an ordinal >= size(). */
	getRow(ordinal: number): Row;
}

/** One serialized cell. The null sentinel and collection renderings are strings. */
export type GenericValue = string | number | boolean | Uint8Array;

export type QueryOutcome =
	| { kind: 'acknowledgement' }
	| { kind: 'tabular'; table: Table; addRowIndex: boolean }
	| { kind: 'insert'; id: number }
	| { kind: 'modify'; count: number };

export type RowWindow = {
	limit: number;
	ascending: boolean;
};

export type SqlError = { code: number; message: string };

export type QueryResultResponse = { columnNames: string[]; values: GenericValue[] };
export type QueryErrorResponse = { sqlError: SqlError };
export type ExecuteQueryResponse = QueryResultResponse | QueryErrorResponse;

export type DatabaseDescriptor = { id: string; name: string };

/**
 * The storage engine behind the bridge. Table enumeration and query execution
 * both live here; the bridge only formats what comes back.
 */
export interface DatabaseSource {
	listDatabases(): MaybePromise<DatabaseDescriptor[]>;
	listTables(databaseId: string, includeMeta: boolean): MaybePromise<string[]>;
	execute(databaseId: string, query: string): MaybePromise<QueryOutcome>;
}

export type InspectorMetricEvents = {
	databases: { count: number };
	tables: { databaseId: string; count: number };
	query: { databaseId: string; columns: number; values: number; durationMs: number };
	queryError: { databaseId: string; message: string };
};

export interface InspectorMetrics {
	on<E extends keyof InspectorMetricEvents>(event: E, data: InspectorMetricEvents[E]): void;
}
