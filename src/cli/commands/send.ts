/**
 * `s3-rest send`: sign and send one REST request
 */

import { writeFile } from 'node:fs/promises';
import { S3RestClient } from '../../client/index.js';
import { loadConfigFile, parseOverrides } from '../../config/index.js';
import { parseHeaderList, parseHttpMethod, parseParameterList, type Clock } from '../../request/index.js';
import { findXmlValues, formatResponse, isSuccessStatus, pickHeaders } from '../../response/index.js';
import { UndiciTransport, type HttpResponse, type HttpTransport } from '../../transport/index.js';
import { createCliLogger, loadPayload, parseOutputMode } from '../args.js';

export interface SendArguments {
  readonly config: string;
  readonly method: string;
  readonly bucket?: string;
  readonly key?: string;
  readonly payload?: string;
  readonly payloadIsFile?: boolean;
  readonly signPayload?: boolean;
  readonly parameters?: string;
  readonly headers?: string;
  readonly saveContentToFile?: string;
  readonly substituteParameters?: string;
  readonly overrideConfiguration?: string;
  readonly proxyEndpoint?: string;
  readonly xmlQuery?: string;
  readonly searchHeaders?: string;
  readonly logLevel: string;
  readonly region?: string;
}

export interface SendDependencies {
  readonly transport?: HttpTransport;
  readonly clock?: Clock;
  readonly output?: (text: string) => void;
}

export async function runSend(args: SendArguments, deps: SendDependencies = {}): Promise<HttpResponse> {
  const output = deps.output ?? ((text: string) => console.log(text));
  const mode = parseOutputMode(args.logLevel);
  const logger = createCliLogger(mode.level);

  const overrides = args.overrideConfiguration ? parseOverrides(args.overrideConfiguration) : undefined;
  const config = await loadConfigFile(args.config, overrides);

  const client = new S3RestClient({
    config,
    region: args.region,
    transport: deps.transport ?? new UndiciTransport({ proxyEndpoint: args.proxyEndpoint }),
    logger,
    clock: deps.clock,
  });

  const response = await client.send({
    method: parseHttpMethod(args.method),
    bucket: args.bucket,
    key: args.key,
    parameters: args.parameters ? parseParameterList(args.parameters) : [],
    headers: args.headers ? parseHeaderList(args.headers) : {},
    payload: await loadPayload({
      payload: args.payload,
      payloadIsFile: args.payloadIsFile,
      signPayload: args.signPayload,
      substitutions: args.substituteParameters,
    }),
  });

  if (args.saveContentToFile && isSuccessStatus(response.status) && response.body.byteLength > 0) {
    await writeFile(args.saveContentToFile, response.body);
    logger.info(`Content saved to ${args.saveContentToFile}`, { bytes: response.body.byteLength });
  }

  if (mode.raw) {
    output(formatResponse(response));
  }
  if (args.xmlQuery && response.body.byteLength > 0) {
    for (const value of findXmlValues(new TextDecoder().decode(response.body), args.xmlQuery)) {
      output(value);
    }
  }
  if (args.searchHeaders) {
    for (const line of pickHeaders(response.headers, args.searchHeaders)) {
      output(line);
    }
  }

  return response;
}
