import { createEndpoint } from 'better-call';
import { responseFromError } from '../../shared/errors.js';
import type { RouteContext } from '../utils.js';

export function buildGetDatabases(rc: RouteContext) {
	return createEndpoint('/databases', { method: 'GET' }, async (ctx) => {
		try {
			const databases = await Promise.resolve(rc.source.listDatabases());
			rc.metrics?.on('databases', { count: databases.length });
			rc.log('databases', { count: databases.length });
			return { databases };
		} catch (e) {
			return responseFromError(e, { requestId: rc.requestId(ctx.headers) });
		}
	});
}
