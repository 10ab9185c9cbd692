import type { ValueTransformer } from "typeorm";

/**
 * Stores u64 amounts as decimal text; SQLite integers are signed 64-bit.
 */
export const bigintTransformer: ValueTransformer = {
	to: (value: bigint | null | undefined) =>
		value === null || value === undefined ? value : value.toString(),
	from: (value: string | null) => (value === null ? null : BigInt(value)),
};
