/**
 * Failover Engine
 *
 * Satisfies one logical call against an ordered pool, trying members one at
 * a time in the order a candidate policy gives. First success wins; the rest
 * stay untried. Retries are bounded by pool size, with no backoff.
 *
 * @module rpc/FailoverEngine
 */

import type { Logger } from 'pino';
import type { CandidatePolicy } from './CandidateSequence.js';
import { createPolicy } from './CandidateSequence.js';
import type { ResponseNormalizer } from './ResponseNormalizer.js';
import type { CallOptions, FailoverPolicy } from './types.js';
import {
  ErrorUtils,
  NoActiveProviderError,
  NoProvidersConfiguredError,
} from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

/**
 * What the engine needs to know about a pool member
 */
export interface PoolMember {
  readonly url: string;
  readonly provider: string;
}

export interface FailoverEngineOptions {
  policy?: FailoverPolicy | CandidatePolicy;
  logger?: Logger;
}

export interface ExecuteOptions<R> extends CallOptions {
  /** Run on the successful response before it is returned */
  normalizer?: ResponseNormalizer<R>;
  /** Logged at debug level on success */
  params?: unknown;
}

export type AsyncAttempt<TMember, R> = (member: TMember, options: CallOptions) => Promise<R>;
export type SyncAttempt<TMember, R> = (member: TMember) => R;

export class FailoverEngine<TMember extends PoolMember> {
  private readonly members: readonly TMember[];
  private readonly policy: CandidatePolicy;
  private readonly logger: Logger;

  constructor(members: readonly TMember[], options: FailoverEngineOptions = {}) {
    this.members = Object.freeze([...members]);
    const policy = options.policy ?? 'rotating';
    this.policy = typeof policy === 'string' ? createPolicy(policy) : policy;
    this.logger = options.logger ?? createChildLogger('failover');
  }

  get size(): number {
    return this.members.length;
  }

  get policyName(): FailoverPolicy {
    return this.policy.name;
  }

  getMembers(): readonly TMember[] {
    return this.members;
  }

  /**
   * Tries candidates one by one, awaiting each attempt
   */
  async execute<R>(
    target: string,
    attempt: AsyncAttempt<TMember, R>,
    options: ExecuteOptions<R> = {},
  ): Promise<R> {
    this.assertNotEmpty();
    const errors: Error[] = [];
    const { signal } = options;

    for (const index of this.policy.candidates(this.members.length)) {
      signal?.throwIfAborted();
      const member = this.members[index];

      let response: R;
      try {
        response = await attempt(member, { signal });
      } catch (err) {
        this.handleFailure(member, err, errors, signal);
        continue;
      }

      return this.complete(target, response, options);
    }

    return this.exhausted(errors);
  }

  /**
   * Same contract as execute(), for attempts that complete synchronously
   */
  executeSync<R>(
    target: string,
    attempt: SyncAttempt<TMember, R>,
    options: ExecuteOptions<R> = {},
  ): R {
    this.assertNotEmpty();
    const errors: Error[] = [];
    const { signal } = options;

    for (const index of this.policy.candidates(this.members.length)) {
      signal?.throwIfAborted();
      const member = this.members[index];

      let response: R;
      try {
        response = attempt(member);
      } catch (err) {
        this.handleFailure(member, err, errors, signal);
        continue;
      }

      return this.complete(target, response, options);
    }

    return this.exhausted(errors);
  }

  private assertNotEmpty(): void {
    if (this.members.length === 0) {
      throw new NoProvidersConfiguredError();
    }
  }

  private complete<R>(target: string, response: R, options: ExecuteOptions<R>): R {
    options.normalizer?.normalize(target, response);
    this.logger.debug(
      { method: target, params: options.params },
      `Send request using ${this.policy.name} policy.`,
    );
    return response;
  }

  /**
   * Caller misuse and cancellation escape immediately; anything else is the
   * endpoint's failure and moves on to the next candidate.
   */
  private handleFailure(member: TMember, err: unknown, errors: Error[], signal?: AbortSignal): void {
    if (ErrorUtils.isCallerError(err)) throw err;
    if (signal?.aborted) throw signal.reason;

    this.policy.recordFailure(this.members.length);
    const error = ErrorUtils.toError(err);
    errors.push(error);
    this.logger.warn(
      {
        provider: member.provider,
        error: ErrorUtils.redact(error.message, [member.url]),
      },
      'Provider not responding.',
    );
  }

  private exhausted(errors: Error[]): never {
    this.logger.debug({ attempts: errors.length }, 'No active provider available.');
    throw new NoActiveProviderError(errors);
  }
}
