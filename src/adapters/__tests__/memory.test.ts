import { describe, it, expect } from 'vitest';
import { memoryDatabase, memorySource, MemoryTable, shortestFloat } from '../memory.js';
import { responseForOutcome } from '../../core/dispatch.js';
import { InspectorError, InvariantError, QueryExecutionError } from '../../shared/errors.js';

function zoo() {
	const db = memoryDatabase('zoo');
	const person = db.createTable('Person', { columns: { name: 'STRING' } });
	const dog = db.createTable('Dog', {
		columns: {
			name: 'STRING',
			owner: { type: 'OBJECT', target: 'Person' },
			tags: 'STRING_LIST',
			friends: { type: 'LIST', target: 'Dog' }
		}
	});
	db.createTable('metadata', { columns: { version: 'INTEGER' }, internal: true });
	person.insert({ name: 'Ann' });
	dog.insert({ name: 'Rex', owner: 0, tags: ['good'], friends: [] });
	dog.insert({ name: 'Fido', owner: null, tags: null, friends: [0] });
	return db;
}

describe('memory source', () => {
	it('lists databases by id with their names', () => {
		const source = memorySource({ main: zoo() });
		expect(source.listDatabases()).toEqual([{ id: 'main', name: 'zoo' }]);
	});

	it('hides internal tables unless asked for', () => {
		const source = memorySource({ main: zoo() });
		expect(source.listTables('main', false)).toEqual(['Person', 'Dog']);
		expect(source.listTables('main', true)).toEqual(['Person', 'Dog', 'metadata']);
	});

	it('answers SELECT * with an indexed table', () => {
		const db = zoo();
		const outcome = memorySource({ main: db }).execute('main', 'select * from "Dog";');
		expect(outcome).toEqual({ kind: 'tabular', table: db.table('Dog'), addRowIndex: true });
	});

	it('renders links, link lists and value lists', () => {
		const outcome = zoo().execute('SELECT * FROM Dog');
		expect(responseForOutcome(outcome, { limit: 10, ascending: true })).toEqual({
			columnNames: ['<index>', 'name', 'owner', 'tags', 'friends'],
			values: [0, 'Rex', 0, 'STRING_LIST{good}', 'Dog{}', 1, 'Fido', '[null]', '[null]', 'Dog{0}']
		});
	});

	it('rejects other statements as query errors', () => {
		const db = zoo();
		expect(() => db.execute('  DELETE FROM Dog ')).toThrow(new QueryExecutionError('unsupported query: DELETE FROM Dog'));
		expect(() => db.execute('SELECT * FROM Cat')).toThrow(new QueryExecutionError('no such table: Cat'));
		expect(() => db.execute('SELECT * FROM Dog')).not.toThrow();
	});

	it('reports unknown databases as not found', () => {
		const source = memorySource({ main: zoo() });
		expect(() => source.execute('toString', 'SELECT * FROM Dog')).toThrow(InspectorError);
		try {
			source.listTables('other', false);
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(InspectorError);
			if (e instanceof InspectorError) {
				expect(e.code).toBe('NOT_FOUND');
				expect(e.status).toBe(404);
				expect(e.details).toEqual({ databaseId: 'other' });
			}
		}
	});
});

describe('MemoryTable', () => {
	it('assigns object keys after the highest one used', () => {
		const t = new MemoryTable('T');
		t.addColumn('x', 'INTEGER');
		expect(t.insert({ x: 1 }, 10)).toBe(10);
		expect(t.insert({ x: 2 })).toBe(11);
		expect(t.insert({ x: 3 }, 5)).toBe(5);
		expect(t.insert({ x: 4 })).toBe(12);
		expect(t.getRow(3).objectKey).toBe(12);
	});

	it('refuses a reused object key', () => {
		const t = new MemoryTable('T');
		t.addColumn('x', 'INTEGER');
		t.insert({ x: 1 }, 3);
		expect(() => t.insert({ x: 2 }, 3)).toThrow(InvariantError);
	});

	it('refuses unknown columns and late column additions', () => {
		const t = new MemoryTable('T');
		t.addColumn('x', 'INTEGER');
		expect(() => t.insert({ y: 1 })).toThrow(InvariantError);
		t.insert({ x: 1 });
		expect(() => t.addColumn('y', 'STRING')).toThrow(InvariantError);
	});

	it('allows repeated column names with distinct keys', () => {
		const t = new MemoryTable('result');
		const a = t.addColumn('n', 'INTEGER');
		const b = t.addColumn('n', 'STRING');
		t.appendRow([1, 'one']);
		expect([a.key, b.key]).toEqual([0, 1]);
		expect(t.getRow(0).getLong(a.key)).toBe(1);
		expect(t.getRow(0).getString(b.key)).toBe('one');
	});

	it('treats missing cells as null', () => {
		const t = new MemoryTable('T');
		const x = t.addColumn('x', 'INTEGER');
		t.insert({});
		expect(t.getRow(0).isNull(x.key)).toBe(true);
	});

	it('reads floats at single precision with the shortest digits', () => {
		const t = new MemoryTable('T');
		const f = t.addColumn('f', 'FLOAT');
		t.insert({ f: 0.1 });
		t.insert({ f: 1 / 3 });
		t.insert({ f: Number.NEGATIVE_INFINITY });
		expect(t.getRow(0).getFloat(f.key)).toBe(0.1);
		expect(t.getRow(1).getFloat(f.key)).toBe(0.33333334);
		expect(t.getRow(2).getFloat(f.key)).toBe(Number.NEGATIVE_INFINITY);
	});

	it('finds the shortest decimal for a float', () => {
		expect(shortestFloat(Math.fround(0.1))).toBe(0.1);
		expect(shortestFloat(Math.fround(16777217))).toBe(16777216);
		expect(shortestFloat(Number.NaN)).toBeNaN();
	});

	it('fails typed reads of mismatched cells', () => {
		const t = new MemoryTable('T');
		const x = t.addColumn('x', 'INTEGER');
		t.insert({ x: 'seven' });
		expect(() => t.getRow(0).getLong(x.key)).toThrow(InvariantError);
		expect(() => t.getRow(1)).toThrow(InvariantError);
	});

	it('refuses a duplicate table', () => {
		const db = zoo();
		expect(() => db.createTable('Dog', { columns: {} })).toThrow(InvariantError);
	});
});
