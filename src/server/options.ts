import { z } from 'zod';
import { InspectorError } from '../shared/errors.js';

export const DEFAULT_LIMIT = 250;

export const inspectorOptionsSchema = z.object({
	/** Max rows returned per tabular result. */
	limit: z.number().int().nonnegative().default(DEFAULT_LIMIT),
	ascending: z.boolean().default(true),
	/** Include internal tables when listing. */
	withMetaTables: z.boolean().default(false),
	debug: z.boolean().default(false)
});

export type InspectorOptions = z.input<typeof inspectorOptionsSchema>;
export type ResolvedInspectorOptions = z.output<typeof inspectorOptionsSchema>;

export function resolveOptions(input: InspectorOptions = {}): ResolvedInspectorOptions {
	const parsed = inspectorOptionsSchema.safeParse(input);
	if (!parsed.success) {
		throw new InspectorError('INVALID_CONFIG', 'Invalid inspector options', { issues: parsed.error.issues });
	}
	return parsed.data;
}
