/** Injection token for the process-wide {@link KeyedMutex}. */
export const LOCKS = "LOCKS";
