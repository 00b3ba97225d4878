import { monotonicFactory } from 'ulid';
import type { DatabaseSource, InspectorMetrics } from '../shared/types.js';
import type { ResolvedInspectorOptions } from './options.js';

export type DebugLog = (message: string, data?: Record<string, unknown>) => void;

/** Everything a route needs, built once per inspector. */
export type RouteContext = {
	source: DatabaseSource;
	options: ResolvedInspectorOptions;
	metrics?: InspectorMetrics;
	log: DebugLog;
	requestId(headers?: Headers): string;
};

export function createDebugLog(enabled: boolean): DebugLog {
	return (message, data) => {
		if (!enabled) return;
		if (data) console.debug('[inspector-bridge]', message, data);
		else console.debug('[inspector-bridge]', message);
	};
}

export function createRequestIds(): (headers?: Headers) => string {
	const ulid = monotonicFactory();
	return (headers) => headers?.get('X-Request-Id') || ulid();
}
