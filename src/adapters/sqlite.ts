import type { Database, Statement } from 'better-sqlite3';
import { InspectorError, QueryExecutionError } from '../shared/errors.js';
import type { DatabaseDescriptor, DatabaseSource, ListValue, NativeFieldType, QueryOutcome } from '../shared/types.js';
import { MemoryTable, type CellInput } from './memory.js';

export type SqliteSourceOptions = {
	/** Open handles keyed by database id. */
	databases: Record<string, Database>;
};

const META_TABLE_RE = /^(sqlite_|android_metadata$)/;

/** Column type from a declared type, by SQLite's affinity rules; null means "look at the values". */
export function declaredFieldType(declared: string | null): NativeFieldType | null {
	if (!declared) return null;
	const t = declared.toUpperCase();
	if (t.includes('BOOL')) return 'BOOLEAN';
	if (t.includes('INT')) return 'INTEGER';
	if (t.includes('CHAR') || t.includes('CLOB') || t.includes('TEXT')) return 'STRING';
	if (t.includes('BLOB')) return 'BINARY';
	if (t.includes('REAL') || t.includes('FLOA') || t.includes('DOUB')) return 'DOUBLE';
	if (t.includes('DATE') || t.includes('TIME')) return 'DATE';
	return null;
}

function inferredFieldType(values: readonly unknown[]): NativeFieldType {
	const sample = values.find((v) => v !== null && v !== undefined);
	if (typeof sample === 'bigint') return 'INTEGER';
	if (typeof sample === 'number') return Number.isInteger(sample) ? 'INTEGER' : 'DOUBLE';
	if (sample instanceof Uint8Array) return 'BINARY';
	return 'STRING';
}

/** Convert one stored value for a column of `type`; undefined when it does not fit. */
function convert(type: NativeFieldType, v: unknown): ListValue | undefined {
	if (v === null || v === undefined) return null;
	switch (type) {
		case 'INTEGER':
			if (typeof v === 'bigint') return Number(v);
			return typeof v === 'number' && Number.isInteger(v) ? v : undefined;
		case 'DOUBLE':
			if (typeof v === 'bigint') return Number(v);
			return typeof v === 'number' ? v : undefined;
		case 'BOOLEAN':
			if (typeof v === 'bigint') return v !== 0n;
			return typeof v === 'number' ? v !== 0 : undefined;
		case 'BINARY':
			return v instanceof Uint8Array ? v : undefined;
		case 'DATE': {
			// numeric dates may be seconds, millis or julian days; leave them to DOUBLE
			if (typeof v !== 'string') return undefined;
			const date = new Date(v);
			return Number.isNaN(date.getTime()) ? undefined : date;
		}
		default:
			if (v instanceof Uint8Array) return Buffer.from(v).toString('hex');
			return String(v);
	}
}

function convertColumn(type: NativeFieldType, values: readonly unknown[]): ListValue[] | undefined {
	const out: ListValue[] = [];
	for (const v of values) {
		const converted = convert(type, v);
		if (converted === undefined) return undefined;
		out.push(converted);
	}
	return out;
}

/**
 * Pick the first candidate type every value converts to. SQLite does not enforce
 * declared types, so a column may fall back to DOUBLE and finally STRING.
 */
export function typeColumn(declared: string | null, values: readonly unknown[]): { type: NativeFieldType; cells: ListValue[] } {
	const candidates: NativeFieldType[] = [declaredFieldType(declared) ?? inferredFieldType(values), 'DOUBLE', 'STRING'];
	for (const type of candidates) {
		const cells = convertColumn(type, values);
		if (cells) return { type, cells };
	}
	return { type: 'STRING', cells: values.map((v) => (v === null || v === undefined ? null : String(v))) };
}

function isRowArray(r: unknown): r is unknown[] {
	return Array.isArray(r);
}

/** Copy a reader statement's result set into a table; object keys are result ordinals. */
export function snapshotResult(name: string, stmt: Statement): MemoryTable {
	const defs = stmt.columns();
	const rows = stmt.raw(true).all().filter(isRowArray);
	const table = new MemoryTable(name);
	const columns = defs.map((def, c) => typeColumn(def.type, rows.map((r) => r[c])));
	defs.forEach((def, c) => table.addColumn(def.name, columns[c]?.type ?? 'STRING'));
	rows.forEach((_, r) => {
		const cells: CellInput[] = columns.map((col) => col.cells[r] ?? null);
		table.appendRow(cells, r);
	});
	return table;
}

function firstKeyword(query: string): string {
	return (query.trim().split(/\s+/)[0] ?? '').toUpperCase();
}

function runQuery(db: Database, query: string): QueryOutcome {
	const stmt = db.prepare(query);
	if (stmt.reader) {
		return { kind: 'tabular', table: snapshotResult('result', stmt), addRowIndex: false };
	}
	const info = stmt.run();
	switch (firstKeyword(query)) {
		case 'INSERT':
		case 'REPLACE':
			return { kind: 'insert', id: Number(info.lastInsertRowid) };
		case 'UPDATE':
		case 'DELETE':
			return { kind: 'modify', count: info.changes };
		default:
			return { kind: 'acknowledgement' };
	}
}

/**
 * Serve `better-sqlite3` handles as inspectable databases.
 *
 * @example
 * import Database from 'better-sqlite3';
 * const source = sqliteSource({ databases: { main: new Database('app.db') } });
 */
export function sqliteSource(options: SqliteSourceOptions): DatabaseSource {
	const { databases } = options;
	function get(databaseId: string): Database {
		const db = Object.hasOwn(databases, databaseId) ? databases[databaseId] : undefined;
		if (!db) throw new InspectorError('NOT_FOUND', `Unknown database: ${databaseId}`, { databaseId });
		return db;
	}
	return {
		listDatabases(): DatabaseDescriptor[] {
			return Object.entries(databases).map(([id, db]) => ({ id, name: db.name }));
		},
		listTables(databaseId, includeMeta) {
			const names = get(databaseId)
				.prepare(`SELECT name FROM sqlite_master WHERE type IN ('table','view') ORDER BY name`)
				.pluck()
				.all()
				.filter((n): n is string => typeof n === 'string');
			return includeMeta ? names : names.filter((n) => !META_TABLE_RE.test(n));
		},
		execute(databaseId, query) {
			const db = get(databaseId);
			try {
				return runQuery(db, query);
			} catch (e) {
				if (e instanceof Error) throw new QueryExecutionError(e.message, { cause: e });
				throw e;
			}
		}
	};
}
