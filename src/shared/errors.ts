export type ErrorCode = 'BAD_REQUEST' | 'NOT_FOUND' | 'INVALID_CONFIG' | 'INTERNAL';

export class InspectorError extends Error {
	code: ErrorCode;
	status: number;
	details?: Record<string, unknown>;

	constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, status?: number) {
		super(message);
		this.name = 'InspectorError';
		this.code = code;
		this.details = details;
		this.status = status ?? httpStatusFor(code);
	}
}

/** Raised by a storage engine when a submitted query fails. Reported to the client inline. */
export class QueryExecutionError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'QueryExecutionError';
	}
}

/** A broken caller contract. Never reported as a query failure. */
export class InvariantError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'InvariantError';
	}
}

export function invariant(condition: boolean, message: string): asserts condition {
	if (!condition) throw new InvariantError(message);
}

export function httpStatusFor(code: ErrorCode): number {
	if (code === 'BAD_REQUEST') return 400;
	if (code === 'NOT_FOUND') return 404;
	return 500;
}

export function toInspectorError(e: unknown): InspectorError {
	if (e instanceof InspectorError) return e;
	if (e instanceof Error) return new InspectorError('INTERNAL', e.message || 'Internal error', { name: e.name });
	return new InspectorError('INTERNAL', 'Internal error');
}

export function responseFromError(e: unknown, extraDetails?: Record<string, unknown>): Response {
	const err = toInspectorError(e);
	const headers = { 'Content-Type': 'application/json' };
	const body = { code: err.code, message: err.message, details: { ...(err.details ?? {}), ...(extraDetails ?? {}) } };
	return new Response(JSON.stringify(body), { status: err.status, headers });
}
