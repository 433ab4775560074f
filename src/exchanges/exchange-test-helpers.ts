/**
 * Shared fixtures for exchange operation and capability tests.
 */

import type { BoundCall, Executor } from "../client/capability.js";
import { validate } from "../lib/validation/index.js";
import type { PathParams } from "../operation/types.js";
import type { OperationDescriptor } from "../pipeline/types.js";

export interface RecordedCall {
	readonly operation: OperationDescriptor;
	readonly pathParams?: PathParams | undefined;
}

/**
 * Executor that answers every call by validating `payload` against the
 * operation's own response schema, recording what it was asked to run.
 */
export function recordingExecutor(payload: unknown): {
	readonly execute: Executor;
	readonly calls: RecordedCall[];
} {
	const calls: RecordedCall[] = [];
	const execute: Executor = async <T>(call: BoundCall<T>) => {
		calls.push({ operation: call.operation, pathParams: call.pathParams });
		return validate(call.operation.response, payload);
	};
	return { execute, calls };
}
