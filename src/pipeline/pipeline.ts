import type { Schema } from "../lib/validation/index.js";
import type { SdkError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import type { Handler, Layer, Stage } from "./types.js";

/**
 * Immutable middleware chain. Start from the innermost stage and wrap it
 * outward; each {@link Pipeline.with} returns a new pipeline.
 *
 * @example
 * ```ts
 * const chain = Pipeline.create(transportLayer(profile, baseUrls, transport, logger))
 *   .with(authLayer(profile, credentials, signing))
 *   .with(exchangeLayer(profile, logger));
 * const result = await chain.call({ operation: op }, op.response);
 * ```
 */
export class Pipeline<Req> {
	private readonly handler: Handler<Req>;
	private readonly stages: readonly string[];

	private constructor(handler: Handler<Req>, stages: readonly string[]) {
		this.handler = handler;
		this.stages = stages;
	}

	static create<Req>(stage: Stage<Req>): Pipeline<Req> {
		return new Pipeline(stage.handle, [stage.name]);
	}

	/** Wraps the current chain in `layer`, returning a new pipeline. */
	with<Outer>(layer: Layer<Outer, Req>): Pipeline<Outer> {
		return new Pipeline(layer.wrap(this.handler), [layer.name, ...this.stages]);
	}

	call<T>(request: Req, schema: Schema<T>): Promise<Result<T, SdkError>> {
		return this.handler(request, schema);
	}

	/** @returns Stage names, outermost first */
	stageNames(): readonly string[] {
		return this.stages;
	}
}
