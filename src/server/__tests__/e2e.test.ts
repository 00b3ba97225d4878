import http from 'node:http';
import Database from 'better-sqlite3';
import { toNodeHandler } from 'better-call/node';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createInspector, sqliteSource } from '../../index.js';

let server: http.Server;
let db: Database.Database;
let baseURL = '';

beforeAll(async () => {
	db = new Database(':memory:');
	db.exec(`CREATE TABLE notes (id INTEGER PRIMARY KEY, body TEXT)`);
	const inspector = createInspector({ source: sqliteSource({ databases: { app: db } }) });
	server = http.createServer(toNodeHandler(inspector.handler));
	await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
	const address = server.address();
	if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
	baseURL = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
	await new Promise<void>((resolve) => server.close(() => resolve()));
	db.close();
});

function execute(query: string) {
	return fetch(`${baseURL}/execute`, {
		method: 'POST',
		headers: { 'Content-Type': 'application/json' },
		body: JSON.stringify({ databaseId: 'app', query })
	}).then((r) => r.json());
}

describe('inspector over node http', () => {
	it('serves a sqlite database end to end', async () => {
		const tables = await fetch(`${baseURL}/tables`, {
			method: 'POST',
			headers: { 'Content-Type': 'application/json' },
			body: JSON.stringify({ databaseId: 'app' })
		}).then((r) => r.json());
		expect(tables).toEqual({ tableNames: ['notes'] });

		expect(await execute(`INSERT INTO notes (body) VALUES ('hello')`)).toEqual({ columnNames: ['ID of last inserted row'], values: [1] });
		expect(await execute(`INSERT INTO notes (body) VALUES (NULL)`)).toEqual({ columnNames: ['ID of last inserted row'], values: [2] });
		expect(await execute('SELECT * FROM notes')).toEqual({ columnNames: ['id', 'body'], values: [1, 'hello', 2, '[null]'] });
		expect(await execute('UPDATE notes SET body = 1')).toEqual({ columnNames: ['Modified rows'], values: [2] });
		expect(await execute('SELECT * FROM missing')).toEqual({ sqlError: { code: 0, message: 'no such table: missing' } });
	});
});
