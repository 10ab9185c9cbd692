import {
	ApiProperty,
	ApiPropertyOptional,
	getSchemaPath,
} from "@nestjs/swagger";

export type ApiPaginatedMeta = {
	nextCursor?: string;
	total: number;
};

export type ApiPaginatedEnvelope<T> = {
	data: T;
	meta: ApiPaginatedMeta;
};

export type ApiEnvelope<T> = {
	data: T;
};

/**
 * Keyset position: items strictly older than (createdBefore, idBefore).
 */
export type Cursor = {
	createdBefore?: number;
	idBefore?: number;
};
export const emptyCursor: Cursor = {
	createdBefore: undefined,
	idBefore: undefined,
};

/**
 * Parses a base64-encoded `createdAt:id` cursor. Unparseable parts come back
 * as `undefined`, which disables keyset filtering.
 */
export function cursorFromString(cursor: string): Cursor {
	const raw = Buffer.from(cursor, "base64").toString("utf8");
	const [tsStr, idStr] = raw.split(":");
	const ts = Number(tsStr);
	const idNum = Number(idStr);
	return {
		createdBefore: tsStr && Number.isInteger(ts) ? ts : undefined,
		idBefore: idStr && Number.isInteger(idNum) ? idNum : undefined,
	};
}

export function cursorToString(createdAt: number, id: number): string {
	return Buffer.from(`${createdAt}:${id}`, "utf8").toString("base64");
}

export const envelope = <T>(data: T): ApiEnvelope<T> => ({ data });

export const paginatedEnvelope = <T>(
	data: T,
	meta: ApiPaginatedMeta,
): ApiPaginatedEnvelope<T> => ({
	data,
	meta,
});

/**
 * Swagger-only DTOs to describe the envelope in responses.
 * They are composed with `getSchemaPath` in controllers.
 */
export class ApiPaginatedMetaDto implements ApiPaginatedMeta {
	@ApiPropertyOptional({
		description:
			"Opaque cursor to fetch the next page. Omitted when there is no next page.",
		example: "MTcwMDAwMDAwMDoxMg==",
	})
	nextCursor?: string;

	@ApiProperty({
		description: "Total number of items across all pages (for this query).",
		example: 42,
	})
	total!: number;
}

/** Placeholder envelope shell; `data` is overridden per endpoint. */
export class ApiEnvelopeShellDto<T> {
	@ApiProperty({
		description: "Payload for this endpoint (shape varies by route)",
	})
	data!: T;
}

export function getSchemaPathForDto(dto: Parameters<typeof getSchemaPath>[0]) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: {
					data: { $ref: getSchemaPath(dto) },
				},
				required: ["data"],
			},
		],
	};
}

export function getSchemaPathForPaginatedDto(
	dto: Parameters<typeof getSchemaPath>[0],
) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: {
					data: {
						type: "array",
						items: { $ref: getSchemaPath(dto) },
					},
					meta: { $ref: getSchemaPath(ApiPaginatedMetaDto) },
				},
				required: ["data", "meta"],
			},
		],
	};
}
