import type { ExecuteQueryResponse, GenericValue } from './types.js';

/** JSON-safe form of a GenericValue. */
export type WireValue = string | number | boolean;

export type WireExecuteQueryResponse =
	| { columnNames: string[]; values: WireValue[] }
	| { sqlError: { code: number; message: string } };

/** Binary cells travel as base64; everything else is already JSON-safe. */
export function toWireValue(value: GenericValue): WireValue {
	if (value instanceof Uint8Array) return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64');
	return value;
}

export function toWireValues(values: readonly GenericValue[]): WireValue[] {
	return values.map(toWireValue);
}

export function toWireResponse(res: ExecuteQueryResponse): WireExecuteQueryResponse {
	if ('sqlError' in res) return res;
	return { columnNames: res.columnNames, values: toWireValues(res.values) };
}
