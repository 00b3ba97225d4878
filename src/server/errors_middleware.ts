import { responseFromError } from '../shared/errors.js';

/** Last line of defence: anything a route lets escape becomes a JSON error carrying a request id. */
export function withRequestId(handler: (req: Request) => Promise<Response>, requestId: (headers?: Headers) => string) {
	return async (req: Request): Promise<Response> => {
		try {
			return await handler(req);
		} catch (e) {
			return responseFromError(e, { requestId: requestId(req.headers) });
		}
	};
}
