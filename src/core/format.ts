import type { Column, GenericValue, LinkList, ListValue, LogicalFieldType, Row, ValueList } from '../shared/types.js';

export const NULL_SENTINEL = '[null]';
export const TRUNCATED_SENTINEL = '{truncated}';
export const INVALID_DATE = 'invalid date';

let dateTimeFormatter: Intl.DateTimeFormat | null = null;

function dateTimeFormat(): Intl.DateTimeFormat {
	if (!dateTimeFormatter) {
		dateTimeFormatter = new Intl.DateTimeFormat(undefined, { dateStyle: 'long', timeStyle: 'long' });
	}
	return dateTimeFormatter;
}

/** Null check first, then the native value as-is. */
export function formatNullable<T extends GenericValue>(row: Row, column: Column, read: (key: number) => T): GenericValue {
	if (row.isNull(column.key)) return NULL_SENTINEL;
	return read(column.key);
}

export function formatFloatingPoint(value: number): GenericValue {
	if (Number.isNaN(value)) return 'NaN';
	if (value === Number.POSITIVE_INFINITY) return 'Infinity';
	if (value === Number.NEGATIVE_INFINITY) return '-Infinity';
	return value;
}

/** Human-readable instant followed by its epoch millis, e.g. `"January 2, 2020 at ... (1577923200000)"`. */
export function formatDate(date: Date): string {
	if (Number.isNaN(date.getTime())) return INVALID_DATE;
	return `${dateTimeFormat().format(date)} (${date.getTime()})`;
}

export function formatLinkList(list: LinkList): string {
	const keys: number[] = [];
	const size = list.size();
	for (let pos = 0; pos < size; pos++) keys.push(list.getObjectKey(pos));
	return `${list.targetTableName}{${keys.join(',')}}`;
}

/** One comma-free token per list element; bytes as hex. */
export function formatListElement(value: ListValue): string {
	if (value instanceof Uint8Array) return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('hex');
	return String(value);
}

export function formatValueList(list: ValueList, type: LogicalFieldType): string {
	const parts: string[] = [];
	const size = list.size();
	for (let pos = 0; pos < size; pos++) parts.push(formatListElement(list.getValue(pos)));
	return `${type}{${parts.join(',')}}`;
}

export function formatUnknown(column: Column): string {
	return `unknown column type: ${column.type}`;
}

/** Render one cell of a known logical type. Never throws for unrecognized types. */
export function formatValue(row: Row, column: Column, type: LogicalFieldType): GenericValue {
	const key = column.key;
	switch (type) {
		case 'INTEGER':
			return formatNullable(row, column, (k) => row.getLong(k));
		case 'BOOLEAN':
			return formatNullable(row, column, (k) => row.getBoolean(k));
		case 'STRING':
			return formatNullable(row, column, (k) => row.getString(k));
		case 'BINARY':
			return formatNullable(row, column, (k) => row.getBinary(k));
		case 'FLOAT':
			if (row.isNull(key)) return NULL_SENTINEL;
			return formatFloatingPoint(row.getFloat(key));
		case 'DOUBLE':
			if (row.isNull(key)) return NULL_SENTINEL;
			return formatFloatingPoint(row.getDouble(key));
		case 'LEGACY_DATE':
		case 'DATE':
			if (row.isNull(key)) return NULL_SENTINEL;
			return formatDate(row.getDate(key));
		case 'OBJECT_LINK':
			if (row.isNullLink(key)) return NULL_SENTINEL;
			return row.getLink(key);
		case 'LINK_LIST':
			// a link list is never null
			return formatLinkList(row.getLinkList(key));
		case 'INTEGER_LIST':
		case 'BOOLEAN_LIST':
		case 'STRING_LIST':
		case 'BINARY_LIST':
		case 'DATE_LIST':
		case 'FLOAT_LIST':
		case 'DOUBLE_LIST':
			if (row.isNullLink(key)) return NULL_SENTINEL;
			return formatValueList(row.getValueList(key), type);
		case 'UNSUPPORTED_TABLE':
		case 'UNSUPPORTED_MIXED':
		case 'UNKNOWN':
			return formatUnknown(column);
		default: {
			const unreachable: never = type;
			return formatUnknown({ ...column, type: String(unreachable) });
		}
	}
}
