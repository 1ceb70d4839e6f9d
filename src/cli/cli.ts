/**
 * s3-rest command line: curl-like S3 REST requests with SigV4 signing
 */

import yargs from 'yargs';
import { runPresign, type PresignDependencies } from './commands/presign.js';
import { runSend, type SendDependencies } from './commands/send.js';
import { runServe, type ServeDependencies } from './commands/serve.js';

const LOG_LEVEL_CHOICES = ['error', 'warn', 'info', 'debug', 'raw', 'mute'];

export type CliDependencies = SendDependencies & PresignDependencies & ServeDependencies;

/**
 * Build the yargs program. Errors are thrown to the caller instead of
 * being printed.
 */
export function createCli(argv: readonly string[], deps: CliDependencies = {}) {
  return yargs(argv)
    .scriptName('s3-rest')
    .usage('Usage: $0 [send|presign|serve] [options]')
    .command(
      ['send', '$0'],
      'Sign and send a REST request',
      (y) =>
        y.options({
          config: { alias: 'c', type: 'string', demandOption: true, description: 'JSON configuration file' },
          method: { alias: 'm', type: 'string', default: 'get', description: 'get | put | post | head | delete' },
          bucket: { alias: 'b', type: 'string', description: 'Bucket name' },
          key: { alias: 'k', type: 'string', description: 'Object key, requires a bucket' },
          payload: { alias: 'p', type: 'string', description: 'Request body, or file name with -f' },
          'payload-is-file': { alias: 'f', type: 'boolean', default: false, description: 'Read the body from the file named by -p' },
          'sign-payload': { alias: 's', type: 'boolean', default: false, description: 'Hash the body into the signature' },
          parameters: { alias: 't', type: 'string', description: '";"-separated key=value query parameters' },
          headers: { alias: 'e', type: 'string', description: '";"-separated Header:value pairs' },
          'save-content-to-file': { alias: 'n', type: 'string', description: 'Write the response body to a file' },
          'substitute-parameters': { alias: 'x', type: 'string', description: '";"-separated key=value body substitutions' },
          'override-configuration': { alias: 'O', type: 'string', description: '";"-separated key=value configuration overrides' },
          'proxy-endpoint': { alias: 'P', type: 'string', description: 'Send to this origin, signed for the configured one' },
          'xml-query': { alias: 'X', type: 'string', description: 'Print element text from the XML response, e.g. ".//aws:UploadId"' },
          'search-headers': { alias: 'H', type: 'string', description: 'Print these comma-separated response headers' },
          'log-level': { alias: 'l', type: 'string', choices: LOG_LEVEL_CHOICES, default: 'info' },
          region: { alias: 'r', type: 'string', description: 'Credential scope region' },
        }),
      async (args) => {
        await runSend(
          {
            config: args.config,
            method: args.method,
            bucket: args.bucket,
            key: args.key,
            payload: args.payload,
            payloadIsFile: args.payloadIsFile,
            signPayload: args.signPayload,
            parameters: args.parameters,
            headers: args.headers,
            saveContentToFile: args.saveContentToFile,
            substituteParameters: args.substituteParameters,
            overrideConfiguration: args.overrideConfiguration,
            proxyEndpoint: args.proxyEndpoint,
            xmlQuery: args.xmlQuery,
            searchHeaders: args.searchHeaders,
            logLevel: args.logLevel,
            region: args.region,
          },
          deps
        );
      }
    )
    .command(
      'presign',
      'Print a presigned URL',
      (y) =>
        y.options({
          config: { alias: 'c', type: 'string', description: 'JSON configuration file with credentials and endpoint' },
          'override-configuration': { alias: 'O', type: 'string', description: '";"-separated key=value configuration overrides' },
          'access-key': { type: 'string', description: 'Access key id' },
          'secret-key': { type: 'string', description: 'Secret access key' },
          endpoint: { alias: 'e', type: 'string', description: 'Endpoint URL, e.g. http://localhost:8000' },
          bucket: { alias: 'b', type: 'string' },
          key: { alias: 'k', type: 'string' },
          method: { alias: 'm', type: 'string', default: 'GET' },
          parameters: { alias: 't', type: 'string', description: '";"-separated key=value query parameters' },
          expiration: { type: 'string', demandOption: true, description: 'days:hours:minutes:seconds' },
          region: { alias: 'r', type: 'string' },
        }),
      async (args) => {
        await runPresign(
          {
            config: args.config,
            overrideConfiguration: args.overrideConfiguration,
            accessKey: args.accessKey,
            secretKey: args.secretKey,
            endpoint: args.endpoint,
            bucket: args.bucket,
            key: args.key,
            method: args.method,
            parameters: args.parameters,
            expiration: args.expiration,
            region: args.region,
          },
          deps
        );
      }
    )
    .command(
      'serve',
      'Log incoming requests, optionally forwarding them upstream',
      (y) =>
        y.options({
          port: { type: 'number', default: 8000 },
          host: { type: 'string', description: 'Interface to bind' },
          upstream: { type: 'string', description: 'Origin to forward requests to' },
          'log-level': { alias: 'l', type: 'string', choices: LOG_LEVEL_CHOICES, default: 'info' },
        }),
      async (args) => {
        await runServe(
          { port: args.port, host: args.host, upstream: args.upstream, logLevel: args.logLevel },
          deps
        );
      }
    )
    .strict()
    .fail(false)
    .help()
    .alias('help', 'h');
}
