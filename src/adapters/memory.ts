import { InspectorError, invariant, QueryExecutionError } from '../shared/errors.js';
import type {
	Column,
	ColumnKey,
	DatabaseDescriptor,
	DatabaseSource,
	LinkList,
	ListValue,
	QueryOutcome,
	Row,
	Table,
	ValueList
} from '../shared/types.js';

/** What a cell may hold: a scalar, a link key, or the elements of a list. */
export type CellInput = ListValue | undefined | readonly ListValue[];

export type ColumnSpec = string | { type: string; target?: string };

export type TableSpec = {
	columns: Record<string, ColumnSpec>;
	/** Meta tables are hidden from table listings unless asked for. */
	internal?: boolean;
};

function isCellList(v: CellInput): v is readonly ListValue[] {
	return Array.isArray(v);
}

export function shortestFloat(f: number): number {
	if (!Number.isFinite(f)) return f;
	for (let digits = 1; digits <= 9; digits++) {
		const candidate = Number(f.toPrecision(digits));
		if (Math.fround(candidate) === f) return candidate;
	}
	return f;
}

class MemoryRow implements Row {
	constructor(
		private readonly table: MemoryTable,
		readonly objectKey: number,
		private readonly cells: readonly CellInput[]
	) {}

	private cell(key: ColumnKey): CellInput {
		invariant(key >= 0 && key < this.cells.length, `no column with key ${key} in ${this.table.name}`);
		return this.cells[key];
	}

	private typed<T>(key: ColumnKey, what: string, guard: (v: unknown) => v is T): T {
		const v = this.cell(key);
		invariant(guard(v), `column ${key} of ${this.table.name} does not hold a ${what}`);
		return v;
	}

	isNull(key: ColumnKey): boolean {
		const v = this.cell(key);
		return v === null || v === undefined;
	}

	isNullLink(key: ColumnKey): boolean {
		return this.isNull(key);
	}

	getLong(key: ColumnKey): number {
		return this.typed(key, 'number', (v): v is number => typeof v === 'number');
	}

	getBoolean(key: ColumnKey): boolean {
		return this.typed(key, 'boolean', (v): v is boolean => typeof v === 'boolean');
	}

	/** Single precision, printed with the fewest digits that read back as the same float. */
	getFloat(key: ColumnKey): number {
		return shortestFloat(Math.fround(this.getDouble(key)));
	}

	getDouble(key: ColumnKey): number {
		return this.typed(key, 'number', (v): v is number => typeof v === 'number');
	}

	getString(key: ColumnKey): string {
		return this.typed(key, 'string', (v): v is string => typeof v === 'string');
	}

	getBinary(key: ColumnKey): Uint8Array {
		return this.typed(key, 'byte array', (v): v is Uint8Array => v instanceof Uint8Array);
	}

	getDate(key: ColumnKey): Date {
		return this.typed(key, 'date', (v): v is Date => v instanceof Date);
	}

	getLink(key: ColumnKey): number {
		return this.getLong(key);
	}

	getLinkList(key: ColumnKey): LinkList {
		const v = this.cell(key);
		const keys: number[] = [];
		if (isCellList(v)) {
			for (const k of v) {
				invariant(typeof k === 'number', `link list ${key} of ${this.table.name} holds a non-key value`);
				keys.push(k);
			}
		} else {
			invariant(v === null || v === undefined, `column ${key} of ${this.table.name} is not a link list`);
		}
		const targetTableName = this.table.linkTarget(key);
		return { targetTableName, size: () => keys.length, getObjectKey: (pos) => keys[pos] ?? -1 };
	}

	getValueList(key: ColumnKey): ValueList {
		const v = this.cell(key);
		invariant(isCellList(v), `column ${key} of ${this.table.name} is not a value list`);
		const values = v;
		return { size: () => values.length, getValue: (pos) => values[pos] ?? null };
	}
}

/**
 * A table held entirely in memory. Columns are keyed by their declaration
 * position; object keys are assigned on insert and never reused.
 */
export class MemoryTable implements Table {
	private readonly cols: Column[] = [];
	private readonly targets = new Map<ColumnKey, string>();
	private readonly rows: MemoryRow[] = [];
	private readonly objectKeys = new Set<number>();
	private nextObjectKey = 0;

	constructor(
		readonly name: string,
		readonly internal = false
	) {}

	/** Result sets may repeat a column name; keys stay distinct. */
	addColumn(name: string, type: string, target?: string): Column {
		invariant(this.rows.length === 0, `cannot add column ${name} to non-empty table ${this.name}`);
		const column: Column = { name, type, key: this.cols.length };
		this.cols.push(column);
		if (target !== undefined) this.targets.set(column.key, target);
		return column;
	}

	linkTarget(key: ColumnKey): string {
		return this.targets.get(key) ?? '';
	}

	/** Append a row by column name; returns its object key. Missing columns are null. */
	insert(values: Record<string, CellInput>, objectKey?: number): number {
		for (const name of Object.keys(values)) {
			invariant(this.cols.some((c) => c.name === name), `unknown column ${name} in ${this.name}`);
		}
		return this.appendRow(this.cols.map((c) => values[c.name] ?? null), objectKey);
	}

	/** Append a row given one cell per column, in column order. */
	appendRow(cells: readonly CellInput[], objectKey?: number): number {
		invariant(cells.length === this.cols.length, `expected ${this.cols.length} cells for ${this.name}, got ${cells.length}`);
		const key = objectKey ?? this.nextObjectKey;
		invariant(!this.objectKeys.has(key), `object key ${key} already used in ${this.name}`);
		this.objectKeys.add(key);
		this.rows.push(new MemoryRow(this, key, cells));
		this.nextObjectKey = Math.max(this.nextObjectKey, key + 1);
		return key;
	}

	columns(): readonly Column[] {
		return this.cols;
	}

	size(): number {
		return this.rows.length;
	}

	getRow(ordinal: number): Row {
		const row = this.rows[ordinal];
		invariant(row !== undefined, `row ${ordinal} out of range for ${this.name} (size ${this.rows.length})`);
		return row;
	}
}

const SELECT_ALL_RE = /^\s*select\s+\*\s+from\s+["`]?([A-Za-z_][\w$]*)["`]?\s*;?\s*$/i;

export class MemoryDatabase {
	private readonly tables = new Map<string, MemoryTable>();

	constructor(readonly name: string) {}

	createTable(name: string, spec: TableSpec): MemoryTable {
		invariant(!this.tables.has(name), `table ${name} already exists in ${this.name}`);
		const table = new MemoryTable(name, spec.internal ?? false);
		for (const [column, def] of Object.entries(spec.columns)) {
			if (typeof def === 'string') table.addColumn(column, def);
			else table.addColumn(column, def.type, def.target);
		}
		this.tables.set(name, table);
		return table;
	}

	table(name: string): MemoryTable | undefined {
		return this.tables.get(name);
	}

	tableNames(includeMeta: boolean): string[] {
		return Array.from(this.tables.values())
			.filter((t) => includeMeta || !t.internal)
			.map((t) => t.name);
	}

	/** Only `SELECT * FROM <table>` is understood; everything else is a query error. */
	execute(query: string): QueryOutcome {
		const match = SELECT_ALL_RE.exec(query);
		if (!match || match[1] === undefined) throw new QueryExecutionError(`unsupported query: ${query.trim()}`);
		const table = this.tables.get(match[1]);
		if (!table) throw new QueryExecutionError(`no such table: ${match[1]}`);
		return { kind: 'tabular', table, addRowIndex: true };
	}
}

export function memoryDatabase(name = 'main'): MemoryDatabase {
	return new MemoryDatabase(name);
}

/** Expose in-memory databases, keyed by database id. */
export function memorySource(databases: Record<string, MemoryDatabase>): DatabaseSource {
	function get(databaseId: string): MemoryDatabase {
		const db = Object.hasOwn(databases, databaseId) ? databases[databaseId] : undefined;
		if (!db) throw new InspectorError('NOT_FOUND', `Unknown database: ${databaseId}`, { databaseId });
		return db;
	}
	return {
		listDatabases(): DatabaseDescriptor[] {
			return Object.entries(databases).map(([id, db]) => ({ id, name: db.name }));
		},
		listTables(databaseId, includeMeta) {
			return get(databaseId).tableNames(includeMeta);
		},
		execute(databaseId, query) {
			return get(databaseId).execute(query);
		}
	};
}
