/**
 * `s3-rest presign`: print a presigned URL
 */

import {
  DEFAULT_REGION,
  DEFAULT_SERVICE,
  endpointFromConfig,
  loadConfigFile,
  parseEndpoint,
  parseOverrides,
  type Endpoint,
  type S3RestConfig,
} from '../../config/index.js';
import { ConfigurationError } from '../../errors/index.js';
import {
  buildRequestDescriptor,
  parseHttpMethod,
  parseParameterList,
  type Clock,
} from '../../request/index.js';
import { presignRequest } from '../../signing/index.js';
import { parseExpiration } from '../args.js';

export interface PresignArguments {
  readonly config?: string;
  readonly overrideConfiguration?: string;
  readonly accessKey?: string;
  readonly secretKey?: string;
  readonly endpoint?: string;
  readonly bucket?: string;
  readonly key?: string;
  readonly method: string;
  readonly parameters?: string;
  readonly expiration: string;
  readonly region?: string;
}

export interface PresignDependencies {
  readonly clock?: Clock;
  readonly output?: (text: string) => void;
}

export async function runPresign(args: PresignArguments, deps: PresignDependencies = {}): Promise<string> {
  const output = deps.output ?? ((text: string) => console.log(text));
  if (args.overrideConfiguration && !args.config) {
    throw ConfigurationError.invalidField('override-configuration', 'Overrides apply to a configuration file (--config)');
  }
  const overrides = args.overrideConfiguration ? parseOverrides(args.overrideConfiguration) : undefined;
  const config: S3RestConfig | undefined = args.config ? await loadConfigFile(args.config, overrides) : undefined;

  const accessKeyId = args.accessKey ?? config?.access_key;
  const secretAccessKey = args.secretKey ?? config?.secret_key;
  if (!accessKeyId) {
    throw ConfigurationError.missingField('access-key', 'An access key is required (--access-key or --config)');
  }
  if (!secretAccessKey) {
    throw ConfigurationError.missingField('secret-key', 'A secret key is required (--secret-key or --config)');
  }

  let endpoint: Endpoint;
  if (args.endpoint) {
    endpoint = parseEndpoint(args.endpoint);
  } else if (config) {
    endpoint = endpointFromConfig(config);
  } else {
    throw ConfigurationError.missingField('endpoint', 'An endpoint is required (--endpoint or --config)');
  }

  const descriptor = buildRequestDescriptor(
    {
      method: parseHttpMethod(args.method),
      bucket: args.bucket,
      key: args.key,
      parameters: args.parameters ? parseParameterList(args.parameters) : [],
    },
    endpoint,
    deps.clock
  );
  const presigned = presignRequest(
    descriptor,
    {
      accessKeyId,
      secretAccessKey,
      region: args.region ?? DEFAULT_REGION,
      service: DEFAULT_SERVICE,
    },
    { expiresIn: parseExpiration(args.expiration) }
  );

  output(presigned.url);
  return presigned.url;
}
