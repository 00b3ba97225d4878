import { createRouter } from 'better-call';
import type { DatabaseSource, InspectorMetrics } from '../shared/types.js';
import { withRequestId } from './errors_middleware.js';
import { resolveOptions, type InspectorOptions } from './options.js';
import { buildGetDatabases } from './routes/databases.js';
import { buildPostExecute } from './routes/execute.js';
import { buildPostTables } from './routes/tables.js';
import { createDebugLog, createRequestIds, type RouteContext } from './utils.js';

export type InspectorConfig = InspectorOptions & {
	source: DatabaseSource;
	/** Optional hook for counting requests and results. */
	metrics?: InspectorMetrics;
};

/**
 * Create the HTTP surface over a database source.
 *
 * - `GET /databases`
 * - `POST /tables` `{ databaseId }`
 * - `POST /execute` `{ databaseId, query }`
 *
 * @example
 * const inspector = createInspector({ source: memorySource({ main: db }), limit: 100 });
 * const res = await inspector.fetch(new Request('http://localhost/tables', { method: 'POST', body: '{"databaseId":"main"}' }));
 */
export function createInspector(config: InspectorConfig) {
	const { source, metrics, ...rest } = config;
	const options = resolveOptions(rest);
	const rc: RouteContext = {
		source,
		options,
		metrics,
		log: createDebugLog(options.debug),
		requestId: createRequestIds()
	};

	const getDatabases = buildGetDatabases(rc);
	const postTables = buildPostTables(rc);
	const postExecute = buildPostExecute(rc);

	const router = createRouter({ getDatabases, postTables, postExecute });
	const fetch = withRequestId(async (req: Request): Promise<Response> => router.handler(req), rc.requestId);

	rc.log('inspector ready', { limit: options.limit, ascending: options.ascending, withMetaTables: options.withMetaTables });
	return { handler: fetch, fetch, options } as const;
}

export type Inspector = ReturnType<typeof createInspector>;
