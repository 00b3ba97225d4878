import { QueryExecutionError } from '../shared/errors.js';
import type { DatabaseSource, ExecuteQueryResponse, QueryOutcome, QueryResultResponse, RowWindow } from '../shared/types.js';
import { flattenRows } from './flatten.js';

export const ROW_INDEX_COLUMN = '<index>';

/** The engine does not classify failures, so every query error carries this code. */
export const QUERY_ERROR_CODE = 0;

export type ExecuteQueryRequest = { databaseId: string; query: string };

export function responseForOutcome(outcome: QueryOutcome, window: RowWindow): QueryResultResponse {
	switch (outcome.kind) {
		case 'acknowledgement':
			return { columnNames: ['success'], values: ['true'] };
		case 'tabular': {
			const { table, addRowIndex } = outcome;
			const columnNames = table.columns().map((c) => c.name);
			if (addRowIndex) columnNames.unshift(ROW_INDEX_COLUMN);
			const values = flattenRows(table, { limit: window.limit, ascending: window.ascending, addRowIndex });
			return { columnNames, values };
		}
		case 'insert':
			return { columnNames: ['ID of last inserted row'], values: [outcome.id] };
		case 'modify':
			return { columnNames: ['Modified rows'], values: [outcome.count] };
		default: {
			const unreachable: never = outcome;
			throw new Error(`Unhandled query outcome: ${JSON.stringify(unreachable)}`);
		}
	}
}

/**
 * Run `query` against the source and shape the outcome for the client.
 *
 * @remarks
 * A failing query is an ordinary result here (`sqlError`), not an exception.
 * Anything the engine throws other than {@link QueryExecutionError} propagates.
 */
export async function executeQuery(source: DatabaseSource, req: ExecuteQueryRequest, window: RowWindow): Promise<ExecuteQueryResponse> {
	let outcome: QueryOutcome;
	try {
		outcome = await Promise.resolve(source.execute(req.databaseId, req.query));
	} catch (e) {
		if (e instanceof QueryExecutionError) {
			return { sqlError: { code: QUERY_ERROR_CODE, message: e.message } };
		}
		throw e;
	}
	return responseForOutcome(outcome, window);
}
