import type { UnixTimestamp } from "@options-escrow/sdk";

export const CLOCK = "CLOCK";

/** Source of "now" for requests that do not carry one. */
export type Clock = () => UnixTimestamp;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
