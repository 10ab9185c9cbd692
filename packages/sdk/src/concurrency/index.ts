export {
	KeyedMutex,
	escrowLockKey,
	GOVERNANCE_LOCK_KEY,
} from "./keyed-mutex.js";
