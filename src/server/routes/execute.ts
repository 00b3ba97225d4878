import { createEndpoint } from 'better-call';
import { z } from 'zod';
import { executeQuery } from '../../core/dispatch.js';
import { responseFromError } from '../../shared/errors.js';
import { toWireResponse } from '../../shared/serializer.js';
import type { RouteContext } from '../utils.js';

export const executeSchema = z.object({
	databaseId: z.string().min(1),
	query: z.string()
});

export function buildPostExecute(rc: RouteContext) {
	const window = { limit: rc.options.limit, ascending: rc.options.ascending };
	return createEndpoint('/execute', { method: 'POST', body: executeSchema }, async (ctx) => {
		const { databaseId, query } = ctx.body;
		const started = performance.now();
		try {
			const res = await executeQuery(rc.source, { databaseId, query }, window);
			if ('sqlError' in res) {
				rc.metrics?.on('queryError', { databaseId, message: res.sqlError.message });
				rc.log('query failed', { databaseId, message: res.sqlError.message });
			} else {
				const durationMs = Math.round(performance.now() - started);
				rc.metrics?.on('query', { databaseId, columns: res.columnNames.length, values: res.values.length, durationMs });
				rc.log('query', { databaseId, values: res.values.length, durationMs });
			}
			return toWireResponse(res);
		} catch (e) {
			return responseFromError(e, { requestId: rc.requestId(ctx.headers) });
		}
	});
}
