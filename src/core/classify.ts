import { NATIVE_FIELD_TYPES, type LogicalFieldType, type NativeFieldType } from '../shared/types.js';

const NATIVE_TO_LOGICAL: Readonly<Record<NativeFieldType, LogicalFieldType>> = {
	INTEGER: 'INTEGER',
	BOOLEAN: 'BOOLEAN',
	STRING: 'STRING',
	BINARY: 'BINARY',
	UNSUPPORTED_TABLE: 'UNSUPPORTED_TABLE',
	UNSUPPORTED_MIXED: 'UNSUPPORTED_MIXED',
	UNSUPPORTED_DATE: 'LEGACY_DATE',
	DATE: 'DATE',
	FLOAT: 'FLOAT',
	DOUBLE: 'DOUBLE',
	OBJECT: 'OBJECT_LINK',
	LIST: 'LINK_LIST',
	// backlinks are not exposed
	LINKING_OBJECTS: 'UNKNOWN',
	INTEGER_LIST: 'INTEGER_LIST',
	BOOLEAN_LIST: 'BOOLEAN_LIST',
	STRING_LIST: 'STRING_LIST',
	BINARY_LIST: 'BINARY_LIST',
	DATE_LIST: 'DATE_LIST',
	FLOAT_LIST: 'FLOAT_LIST',
	DOUBLE_LIST: 'DOUBLE_LIST',
	DECIMAL128: 'UNKNOWN',
	OBJECT_ID: 'UNKNOWN',
	UUID: 'UNKNOWN',
	MIXED: 'UNKNOWN',
	TYPED_LINK: 'UNKNOWN'
};

const NATIVE_SET: ReadonlySet<string> = new Set(NATIVE_FIELD_TYPES);

export function isNativeFieldType(id: string): id is NativeFieldType {
	return NATIVE_SET.has(id);
}

/**
 * Map a native column type identifier to its logical type.
 *
 * @remarks
 * Total: identifiers the engine may add later fall through to `UNKNOWN`.
 */
export function classify(nativeTypeIdentifier: string): LogicalFieldType {
	return isNativeFieldType(nativeTypeIdentifier) ? NATIVE_TO_LOGICAL[nativeTypeIdentifier] : 'UNKNOWN';
}
