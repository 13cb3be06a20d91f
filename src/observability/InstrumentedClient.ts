/**
 * Instrumented session layer
 *
 * Wraps one endpoint client and emits one complete set of observations per
 * request/response cycle: latency, payload sizes, per-method results and
 * batch size. Emission happens in a single finally block, whichever way the
 * call ends. Request and response content pass through untouched.
 *
 * @module observability/InstrumentedClient
 */

import type { Logger } from 'pino';
import type { EndpointClient } from '../rpc/EndpointClient.js';
import { extractMethods, errorCodeOf, encodePayload } from '../rpc/jsonRpc.js';
import { PathClassifier } from '../rpc/PathClassifier.js';
import type {
  CallOptions,
  EndpointIdentity,
  EndpointRequest,
  EndpointResponse,
  JsonRpcRequest,
} from '../rpc/types.js';
import { UNKNOWN_LABEL } from '../rpc/types.js';
import { DataError, EndpointRequestError, ErrorUtils } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import type { IMetricsSink, MetricLabels } from './interfaces.js';
import { NoopMetricsSink, RPC_METRICS } from './metrics.js';

export interface InstrumentedClientOptions {
  sink?: IMetricsSink;
  identity?: EndpointIdentity;
  classifier?: PathClassifier;
  logger?: Logger;
  /** Millisecond clock, performance.now() by default */
  clock?: () => number;
}

/**
 * How the method label of one exchange is derived
 */
type Labeling =
  | { kind: 'json-rpc'; payload: JsonRpcRequest | JsonRpcRequest[] }
  | { kind: 'rest'; path: string };

interface ExchangeRecord {
  labeling: Labeling;
  requestBytes: number;
  elapsedSeconds: number;
  response?: EndpointResponse;
  decoded?: unknown;
  success: boolean;
}

interface MethodOutcome {
  method?: string;
  errorCode: string;
  result: 'success' | 'fail';
}

const defaultIdentity: EndpointIdentity = {
  network: UNKNOWN_LABEL,
  chainId: UNKNOWN_LABEL,
  layer: 'el',
};

/**
 * Checks a decoded body, throwing (typically a DataError) when its shape is
 * not what the caller expects
 */
export type BodyValidator<T> = (decoded: unknown) => T;

const passThrough: BodyValidator<unknown> = (decoded) => decoded;

function splitArguments<T>(
  validateOrOptions: BodyValidator<T> | CallOptions | undefined,
  options: CallOptions,
): [BodyValidator<unknown>, CallOptions] {
  if (typeof validateOrOptions === 'function') return [validateOrOptions, options];
  return [passThrough, validateOrOptions ?? options];
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function outcome(success: boolean): 'success' | 'fail' {
  return success ? 'success' : 'fail';
}

export class InstrumentedClient {
  private readonly client: EndpointClient;
  private readonly sink: IMetricsSink;
  private readonly identity: EndpointIdentity;
  private readonly classifier: PathClassifier;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(client: EndpointClient, options: InstrumentedClientOptions = {}) {
    this.client = client;
    this.sink = options.sink ?? new NoopMetricsSink();
    this.identity = options.identity ?? defaultIdentity;
    this.classifier = options.classifier ?? new PathClassifier();
    this.logger = options.logger ?? createChildLogger('instrumentation');
    this.clock = options.clock ?? (() => performance.now());
  }

  get url(): string {
    return this.client.url;
  }

  get provider(): string {
    return this.client.provider;
  }

  getIdentity(): EndpointIdentity {
    return this.identity;
  }

  /**
   * Same endpoint and sink, new identity labels
   */
  withIdentity(identity: EndpointIdentity): InstrumentedClient {
    return new InstrumentedClient(this.client, {
      sink: this.sink,
      identity,
      classifier: this.classifier,
      logger: this.logger,
      clock: this.clock,
    });
  }

  /**
   * POSTs a JSON-RPC request or batch to the endpoint's base URL and returns
   * the decoded body. A validator runs inside the measured exchange, so a
   * body it rejects is recorded as a failure.
   */
  callJsonRpc<T>(
    payload: JsonRpcRequest | JsonRpcRequest[],
    validate: BodyValidator<T>,
    options?: CallOptions,
  ): Promise<T>;
  callJsonRpc(payload: JsonRpcRequest | JsonRpcRequest[], options?: CallOptions): Promise<unknown>;
  async callJsonRpc<T>(
    payload: JsonRpcRequest | JsonRpcRequest[],
    validateOrOptions?: BodyValidator<T> | CallOptions,
    options: CallOptions = {},
  ): Promise<unknown> {
    const body = encodePayload(payload);
    const [validate, callOptions] = splitArguments(validateOrOptions, options);
    return this.exchange(
      { method: 'POST', path: '', body },
      { kind: 'json-rpc', payload },
      'JSON_RPC_RESPONSE',
      validate,
      callOptions,
    );
  }

  /**
   * Sends a REST request and returns the decoded body; an empty body
   * decodes to undefined
   */
  callRest<T>(request: EndpointRequest, validate: BodyValidator<T>, options?: CallOptions): Promise<T>;
  callRest(request: EndpointRequest, options?: CallOptions): Promise<unknown>;
  async callRest<T>(
    request: EndpointRequest,
    validateOrOptions?: BodyValidator<T> | CallOptions,
    options: CallOptions = {},
  ): Promise<unknown> {
    const [validate, callOptions] = splitArguments(validateOrOptions, options);
    return this.exchange(request, { kind: 'rest', path: request.path }, 'BEACON_RESPONSE', validate, callOptions);
  }

  private async exchange(
    request: EndpointRequest,
    labeling: Labeling,
    dataType: DataError['dataType'],
    validate: BodyValidator<unknown>,
    options: CallOptions,
  ): Promise<unknown> {
    const record: ExchangeRecord = {
      labeling,
      requestBytes: request.body === undefined ? 0 : Buffer.byteLength(request.body, 'utf8'),
      elapsedSeconds: 0,
      success: false,
    };

    try {
      const started = this.clock();
      let response: EndpointResponse;
      try {
        response = await this.client.send(request, options);
        record.response = response;
      } finally {
        record.elapsedSeconds = (this.clock() - started) / 1000;
      }

      if (!isSuccessStatus(response.status)) {
        throw EndpointRequestError.httpStatus(this.client.provider, response.status);
      }

      record.decoded = this.decode(response.body, dataType);
      const validated = validate(record.decoded);
      record.success = true;
      return validated;
    } finally {
      this.emit(record);
    }
  }

  private decode(body: string, dataType: DataError['dataType']): unknown {
    if (dataType === 'BEACON_RESPONSE' && body.trim() === '') {
      return undefined;
    }
    try {
      return JSON.parse(body);
    } catch (err) {
      throw DataError.undecodable(dataType, ErrorUtils.toError(err));
    }
  }

  /**
   * Never throws: a failed observation is dropped and logged at debug level
   */
  private emit(record: ExchangeRecord): void {
    try {
      const base = this.identityLabels();
      const result = outcome(record.success);
      const batched = record.labeling.kind === 'json-rpc' && Array.isArray(record.labeling.payload);

      this.sink.observeHistogram(RPC_METRICS.RESPONSE_SECONDS, record.elapsedSeconds, base);
      this.sink.observeHistogram(RPC_METRICS.REQUEST_PAYLOAD_BYTES, record.requestBytes, base);

      if (record.response) {
        this.sink.observeHistogram(RPC_METRICS.RESPONSE_PAYLOAD_BYTES, this.responseBytes(record.response), base);
      }

      this.sink.incrementCounter(RPC_METRICS.HTTP_RPC_REQUESTS, 1, {
        ...base,
        batched: String(batched),
        response_code: record.response ? String(record.response.status) : '',
        result,
      });

      for (const { method, errorCode, result: methodResult } of this.methodOutcomes(record)) {
        const labels: MetricLabels = { ...base, result: methodResult, rpc_error_code: errorCode };
        if (method !== undefined) labels.method = method;
        this.sink.incrementCounter(RPC_METRICS.RPC_REQUEST, 1, labels);
      }

      if (record.labeling.kind === 'json-rpc' && Array.isArray(record.labeling.payload)) {
        this.sink.observeHistogram(RPC_METRICS.BATCH_SIZE, record.labeling.payload.length, base);
      }
    } catch (err) {
      this.logger.debug(
        { provider: this.client.provider, error: ErrorUtils.toError(err).message },
        'Failed to record request metrics.',
      );
    }
  }

  private identityLabels(): MetricLabels {
    return {
      network: this.identity.network,
      layer: this.identity.layer,
      chain_id: this.identity.chainId,
      provider: this.client.provider,
    };
  }

  /**
   * content-length when the endpoint sent a usable one, else the body size
   */
  private responseBytes(response: EndpointResponse): number {
    const header = response.headers['content-length'];
    if (header !== undefined && /^\d+$/.test(header.trim())) {
      return parseInt(header, 10);
    }
    return Buffer.byteLength(response.body, 'utf8');
  }

  /**
   * One entry per JSON-RPC method (per item for batches), or a single entry
   * labelled with the path template for REST calls. An item carrying an
   * error code is a failure even when the exchange itself succeeded.
   */
  private methodOutcomes(record: ExchangeRecord): MethodOutcome[] {
    const { labeling, decoded, response, success } = record;
    const entry = (method: string | undefined, errorCode: string): MethodOutcome => ({
      method,
      errorCode,
      result: outcome(success && errorCode === ''),
    });

    if (labeling.kind === 'rest') {
      const template = this.classifier.classify(labeling.path);
      if (template === undefined) {
        this.logger.debug({ provider: this.client.provider }, 'Unclassifiable request path, method label omitted.');
      }
      const errorCode = response && !isSuccessStatus(response.status) ? String(response.status) : '';
      return [entry(template, errorCode)];
    }

    if (!Array.isArray(labeling.payload)) {
      const [method] = extractMethods(labeling.payload);
      return [entry(method, errorCodeOf(decoded))];
    }

    const codesById = new Map<unknown, string>();
    if (Array.isArray(decoded)) {
      for (const item of decoded) {
        if (typeof item === 'object' && item !== null && 'id' in item) {
          codesById.set(item.id, errorCodeOf(item));
        }
      }
    }
    return labeling.payload.map((request) => entry(request.method, codesById.get(request.id) ?? ''));
  }
}
