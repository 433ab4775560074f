/**
 * ExchangeClient: one exchange behind the exchange → auth → transport
 * chain. Every call resolves to a Result; nothing throws past here.
 */

import { credentialsFromEnv } from "../auth/credentials.js";
import type { Credentials } from "../auth/types.js";
import { resolveBaseUrls } from "../exchanges/profile.js";
import type { ExchangeProfile } from "../exchanges/profile.js";
import { exchangeEntry } from "../exchanges/registry.js";
import { createLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { Operation, PathParams } from "../operation/types.js";
import { authLayer } from "../pipeline/auth-layer.js";
import { exchangeLayer } from "../pipeline/exchange-layer.js";
import { Pipeline } from "../pipeline/pipeline.js";
import { transportLayer } from "../pipeline/transport-layer.js";
import type { ExchangeCall } from "../pipeline/types.js";
import { configFromEnv, resolveConfig } from "../shared/config.js";
import type { SdkConfig } from "../shared/config.js";
import { NotSupportedError } from "../shared/errors.js";
import type { SdkError } from "../shared/errors.js";
import type { ExchangeId } from "../shared/exchange-id.js";
import { err } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { SystemClock, UuidNonceSource } from "../shared/time.js";
import type { Clock, NonceSource } from "../shared/time.js";
import { FetchTransport } from "../transport/fetch-transport.js";
import type { HttpTransport } from "../transport/types.js";
import { CAPABILITIES } from "./capability.js";
import type {
	Capability,
	CapabilityArgs,
	CapabilityResult,
	CapabilityTable,
	Executor,
} from "./capability.js";

export interface ClientOptions {
	/** Merged over the defaults */
	readonly config?: Partial<SdkConfig> | undefined;
	readonly transport?: HttpTransport | undefined;
	readonly logger?: Logger | undefined;
	readonly clock?: Clock | undefined;
	readonly nonces?: NonceSource | undefined;
}

export interface CallOptions {
	readonly signal?: AbortSignal | undefined;
}

export interface ClientDeps {
	readonly profile: ExchangeProfile;
	readonly capabilities: CapabilityTable;
	readonly config: SdkConfig;
	readonly transport: HttpTransport;
	readonly logger: Logger;
	readonly clock: Clock;
	readonly nonces: NonceSource;
}

export class ExchangeClient {
	protected readonly deps: ClientDeps;
	private readonly pipeline: Pipeline<ExchangeCall>;

	protected constructor(deps: ClientDeps, credentials: Credentials | undefined) {
		this.deps = deps;
		const { profile, config, logger } = deps;
		const baseUrls = resolveBaseUrls(profile, config.baseUrls);
		this.pipeline = Pipeline.create(transportLayer(profile, baseUrls, deps.transport, logger))
			.with(
				authLayer(profile, credentials, {
					clock: deps.clock,
					nonces: deps.nonces,
					recvWindowMs: config.recvWindowMs,
					logger,
				}),
			)
			.with(exchangeLayer(profile, logger));
	}

	/**
	 * Public client for `exchange`. Private operations on it fail with AuthError.
	 *
	 * @example
	 * ```ts
	 * const client = ExchangeClient.create("okx");
	 * const book = await client.execute(okx.books({ instId: "BTC-USDT", sz: 5 }));
	 * ```
	 */
	static create(exchange: ExchangeId, options: ClientOptions = {}): ExchangeClient {
		return new ExchangeClient(resolveDeps(exchange, options), undefined);
	}

	/**
	 * Private client configured from the environment: `CEXWIRE_*` settings
	 * and `<EXCHANGE>_API_KEY` / `_API_SECRET` / `_PASSPHRASE`.
	 * @throws ConfigError or AuthError when the environment is incomplete
	 */
	static fromEnv(
		exchange: ExchangeId,
		options: ClientOptions = {},
		env: NodeJS.ProcessEnv = process.env,
	): PrivateExchangeClient {
		const config = resolveConfig(configFromEnv(env), options.config ?? {});
		return ExchangeClient.create(exchange, { ...options, config }).withAuth(
			credentialsFromEnv(exchange, env),
		);
	}

	get exchange(): ExchangeId {
		return this.deps.profile.id;
	}

	/** Same transport and settings, signing with `credentials` for the client's lifetime. */
	withAuth(credentials: Credentials): PrivateExchangeClient {
		return new PrivateExchangeClient(this.deps, credentials);
	}

	/** Runs one operation through the chain. */
	execute<T>(
		operation: Operation<T>,
		pathParams?: PathParams,
		options: CallOptions = {},
	): Promise<Result<T, SdkError>> {
		return this.pipeline.call({ operation, pathParams, signal: options.signal }, operation.response);
	}

	supports(capability: Capability): boolean {
		return this.deps.capabilities[capability] !== undefined;
	}

	/** @returns Supported capabilities, in declaration order */
	capabilities(): readonly Capability[] {
		return CAPABILITIES.filter((c) => this.supports(c));
	}

	/**
	 * Runs a capability; NotSupportedError when this exchange does not bind it.
	 * `options.signal` reaches every request the capability sends.
	 */
	async run<C extends Capability>(
		capability: C,
		args: CapabilityArgs[C],
		options: CallOptions = {},
	): Promise<Result<CapabilityResult[C], SdkError>> {
		const binding = this.deps.capabilities[capability];
		if (binding === undefined) {
			return err(
				new NotSupportedError(`${this.exchange} does not support ${capability}`, {
					exchange: this.exchange,
					capability,
				}),
			);
		}
		const execute: Executor = (call) => this.execute(call.operation, call.pathParams, options);
		return binding.run(args, execute);
	}
}

/** A client holding credentials; private operations are signed. */
export class PrivateExchangeClient extends ExchangeClient {
	readonly isPrivate = true;

	/** @internal use ExchangeClient.withAuth */
	constructor(deps: ClientDeps, credentials: Credentials) {
		super(deps, credentials);
	}
}

function resolveDeps(exchange: ExchangeId, options: ClientOptions): ClientDeps {
	const { profile, capabilities } = exchangeEntry(exchange);
	const config = resolveConfig(options.config ?? {});
	return {
		profile,
		capabilities,
		config,
		transport: options.transport ?? new FetchTransport(),
		logger: options.logger ?? createLogger({ level: config.logLevel }),
		clock: options.clock ?? SystemClock,
		nonces: options.nonces ?? UuidNonceSource,
	};
}
