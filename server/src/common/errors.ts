export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

/** One-line description of a thrown value for logs. */
export function describeError(err: unknown): string {
	const error = toError(err);
	return `${error.name}: ${error.message}`;
}
