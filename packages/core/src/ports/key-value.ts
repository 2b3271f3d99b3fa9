import type { Computation } from '../contracts/computation';

/**
 * Request/response connection to a key-value service. Each call is a
 * computation that any ticktask executor can drive.
 */
export interface KeyValueConnectionPort {
    get(key: string): Computation<string | undefined>;
    set(key: string, value: string): Computation<void>;
}
