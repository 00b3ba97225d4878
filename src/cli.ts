#!/usr/bin/env node
import http from 'node:http';
import { basename, resolve } from 'node:path';
import Database from 'better-sqlite3';
import { toNodeHandler } from 'better-call/node';
import { sqliteSource } from './adapters/sqlite.js';
import { createInspector } from './server/createInspector.js';
import { DEFAULT_LIMIT } from './server/options.js';

type ArgMap = Record<string, string | boolean>;

const USAGE =
	'inspector-bridge CLI\n\nCommands:\n  serve --db <file> [--id <databaseId>] [--port 9229] [--limit ' +
	DEFAULT_LIMIT +
	'] [--descending] [--with-meta-tables] [--debug]';

function parseArgs(args: string[]): ArgMap {
	const map: ArgMap = {};
	for (let i = 0; i < args.length; i++) {
		const token = args[i] ?? '';
		if (token.startsWith('--')) {
			const key = token.slice(2);
			const next = args[i + 1];
			if (next && !next.startsWith('--')) {
				map[key] = next;
				i++;
			} else {
				map[key] = true;
			}
		}
	}
	return map;
}

function intArg(args: ArgMap, key: string, fallback: number): number {
	const raw = args[key];
	if (typeof raw !== 'string') return fallback;
	const n = Number(raw);
	if (!Number.isInteger(n)) throw new Error(`--${key} must be an integer, got ${raw}`);
	return n;
}

async function serve(args: ArgMap): Promise<void> {
	const file = args.db;
	if (typeof file !== 'string') {
		console.error('serve: --db <file> is required');
		process.exit(1);
	}
	const path = resolve(process.cwd(), file);
	const id = typeof args.id === 'string' ? args.id : basename(path);
	const db = new Database(path, { fileMustExist: true });
	const inspector = createInspector({
		source: sqliteSource({ databases: { [id]: db } }),
		limit: intArg(args, 'limit', DEFAULT_LIMIT),
		ascending: args.descending !== true,
		withMetaTables: args['with-meta-tables'] === true,
		debug: args.debug === true
	});
	const port = intArg(args, 'port', 9229);
	const server = http.createServer(toNodeHandler(inspector.handler));
	await new Promise<void>((done) => server.listen(port, done));
	console.log(`Serving ${path} as "${id}" on http://localhost:${port}`);

	const shutdown = () => {
		server.close(() => {
			db.close();
			process.exit(0);
		});
	};
	process.on('SIGINT', shutdown);
	process.on('SIGTERM', shutdown);
}

async function main() {
	const [, , cmd, ...rest] = process.argv;
	if (!cmd || cmd === 'help') {
		console.log(USAGE);
		process.exit(0);
	}
	if (cmd === 'serve') {
		await serve(parseArgs(rest));
		return;
	}
	console.error(`Unknown command: ${cmd}`);
	process.exit(1);
}

main().catch((err) => {
	console.error(err);
	process.exit(1);
});
