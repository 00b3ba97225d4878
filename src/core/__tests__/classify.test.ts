import { describe, it, expect } from 'vitest';
import { classify, isNativeFieldType } from '../classify.js';
import { NATIVE_FIELD_TYPES } from '../../shared/types.js';

describe('classify', () => {
	it('maps identically named native types to themselves', () => {
		for (const t of ['INTEGER', 'BOOLEAN', 'STRING', 'BINARY', 'DATE', 'FLOAT', 'DOUBLE'] as const) {
			expect(classify(t)).toBe(t);
		}
	});

	it('renames dates, links and link lists', () => {
		expect(classify('UNSUPPORTED_DATE')).toBe('LEGACY_DATE');
		expect(classify('OBJECT')).toBe('OBJECT_LINK');
		expect(classify('LIST')).toBe('LINK_LIST');
	});

	it('keeps every scalar list type', () => {
		expect(classify('INTEGER_LIST')).toBe('INTEGER_LIST');
		expect(classify('BOOLEAN_LIST')).toBe('BOOLEAN_LIST');
		expect(classify('STRING_LIST')).toBe('STRING_LIST');
		expect(classify('BINARY_LIST')).toBe('BINARY_LIST');
		expect(classify('DATE_LIST')).toBe('DATE_LIST');
		expect(classify('FLOAT_LIST')).toBe('FLOAT_LIST');
		expect(classify('DOUBLE_LIST')).toBe('DOUBLE_LIST');
	});

	it('passes the unsupported markers through', () => {
		expect(classify('UNSUPPORTED_TABLE')).toBe('UNSUPPORTED_TABLE');
		expect(classify('UNSUPPORTED_MIXED')).toBe('UNSUPPORTED_MIXED');
	});

	it('maps known but unexposed native types to UNKNOWN', () => {
		for (const t of ['LINKING_OBJECTS', 'DECIMAL128', 'OBJECT_ID', 'UUID', 'MIXED', 'TYPED_LINK']) {
			expect(classify(t)).toBe('UNKNOWN');
		}
	});

	it('falls back to UNKNOWN for anything else', () => {
		expect(classify('GEOSPATIAL')).toBe('UNKNOWN');
		expect(classify('integer')).toBe('UNKNOWN');
		expect(classify('')).toBe('UNKNOWN');
		expect(classify('toString')).toBe('UNKNOWN');
	});

	it('recognizes exactly the native identifiers', () => {
		for (const t of NATIVE_FIELD_TYPES) expect(isNativeFieldType(t)).toBe(true);
		expect(isNativeFieldType('constructor')).toBe(false);
	});
});
