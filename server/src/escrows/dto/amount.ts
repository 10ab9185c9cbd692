/** Decimal string accepted for u64 amounts on the wire. */
export const AMOUNT_PATTERN = /^[0-9]+$/;
