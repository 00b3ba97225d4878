import { invariant } from '../shared/errors.js';
import type { Column, GenericValue, LogicalFieldType, Table } from '../shared/types.js';
import { classify } from './classify.js';
import { formatValue, TRUNCATED_SENTINEL } from './format.js';

export type FlattenOptions = {
	limit: number;
	ascending: boolean;
	addRowIndex: boolean;
};

/**
 * Flatten a window of `table` into one row-major value sequence.
 *
 * @remarks
 * Descending order walks physical ordinals backwards from the last row; it is not
 * a sort. When rows were cut off by `limit`, one extra "row" of truncation markers
 * (one per column, never index-prefixed) closes the sequence.
 */
export function flattenRows(table: Table, opts: FlattenOptions): GenericValue[] {
	invariant(opts.limit >= 0, `limit must be non-negative, got ${opts.limit}`);
	const out: GenericValue[] = [];
	const columns = table.columns();
	const cells: Array<{ column: Column; type: LogicalFieldType }> = columns.map((column) => ({ column, type: classify(column.type) }));
	const tableSize = table.size();
	const count = Math.min(opts.limit, tableSize);

	for (let index = 0; index < count; index++) {
		const ordinal = opts.ascending ? index : tableSize - index - 1;
		const row = table.getRow(ordinal);
		if (opts.addRowIndex) out.push(row.objectKey);
		for (const { column, type } of cells) out.push(formatValue(row, column, type));
	}

	if (opts.limit < tableSize) {
		for (let c = 0; c < columns.length; c++) out.push(TRUNCATED_SENTINEL);
	}
	return out;
}
