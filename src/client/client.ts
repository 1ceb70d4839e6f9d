/**
 * S3 REST client
 *
 * Builds, signs and sends single REST requests against an S3-compatible
 * endpoint.
 */

import {
  credentialsFromConfig,
  endpointFromConfig,
  type Endpoint,
  type S3RestConfig,
} from '../config/index.js';
import { NoopLogger, logError, type Logger } from '../observability/index.js';
import { buildRequestDescriptor, systemClock, type Clock, type RequestInput } from '../request/index.js';
import { isSuccessStatus } from '../response/index.js';
import { Signer, type PresignedRequest, type SigningOptions } from '../signing/index.js';
import { UndiciTransport, type HttpResponse, type HttpTransport } from '../transport/index.js';

/**
 * S3RestClient options.
 */
export interface S3RestClientOptions {
  readonly config: S3RestConfig;
  /** Defaults to us-east-1 */
  readonly region?: string;
  /** Defaults to s3 */
  readonly service?: string;
  readonly transport?: HttpTransport;
  readonly logger?: Logger;
  readonly clock?: Clock;
  /** Headers to sign besides host and x-amz-* */
  readonly signedHeaders?: readonly string[];
}

/**
 * S3 REST client.
 */
export class S3RestClient {
  private readonly endpoint: Endpoint;
  private readonly signer: Signer;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly signingOptions: SigningOptions;

  constructor(options: S3RestClientOptions) {
    this.endpoint = endpointFromConfig(options.config);
    this.signer = new Signer(
      credentialsFromConfig(options.config, { region: options.region, service: options.service })
    );
    this.transport = options.transport ?? new UndiciTransport();
    this.logger = options.logger ?? new NoopLogger();
    this.clock = options.clock ?? systemClock;
    this.signingOptions = options.signedHeaders ? { signedHeaders: options.signedHeaders } : {};
  }

  /**
   * Sign with an Authorization header and send
   */
  async send(input: RequestInput): Promise<HttpResponse> {
    const descriptor = buildRequestDescriptor(input, this.endpoint, this.clock);

    const signingStart = performance.now();
    const signed = this.signer.sign(descriptor, this.signingOptions);
    this.logger.debug('Request signed', {
      signingTimeMs: Number((performance.now() - signingStart).toFixed(4)),
      canonicalRequest: signed.canonicalRequest,
      stringToSign: signed.stringToSign,
    });
    this.logger.info(`${signed.method} ${signed.url}`, { headers: signed.headers });

    const start = performance.now();
    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: signed.method,
        url: signed.url,
        headers: signed.headers,
        body: signed.body && signed.body.byteLength > 0 ? signed.body : undefined,
      });
    } catch (error) {
      if (error instanceof Error) {
        logError(this.logger, `${signed.method} ${signed.url}`, error);
      }
      throw error;
    }

    const context = {
      status: response.status,
      headers: response.headers,
      elapsedMs: Number((performance.now() - start).toFixed(4)),
    };
    if (isSuccessStatus(response.status)) {
      this.logger.info('Response received', context);
    } else {
      this.logger.error('Request failed with status ' + response.status, context);
    }
    return response;
  }

  /**
   * Presigned URL for the request; nothing is sent
   */
  presign(input: RequestInput, expiresIn: number): PresignedRequest {
    const descriptor = buildRequestDescriptor(input, this.endpoint, this.clock);
    const presigned = this.signer.presign(descriptor, { ...this.signingOptions, expiresIn });
    this.logger.debug('URL presigned', {
      canonicalRequest: presigned.canonicalRequest,
      expiresAt: presigned.expiresAt.toISOString(),
    });
    return presigned;
  }
}
