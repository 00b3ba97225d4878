import { createEndpoint } from 'better-call';
import { z } from 'zod';
import { responseFromError } from '../../shared/errors.js';
import type { RouteContext } from '../utils.js';

export const tablesSchema = z.object({
	databaseId: z.string().min(1)
});

export function buildPostTables(rc: RouteContext) {
	return createEndpoint('/tables', { method: 'POST', body: tablesSchema }, async (ctx) => {
		const { databaseId } = ctx.body;
		try {
			const tableNames = await Promise.resolve(rc.source.listTables(databaseId, rc.options.withMetaTables));
			rc.metrics?.on('tables', { databaseId, count: tableNames.length });
			rc.log('tables', { databaseId, count: tableNames.length });
			return { tableNames };
		} catch (e) {
			return responseFromError(e, { requestId: rc.requestId(ctx.headers) });
		}
	});
}
