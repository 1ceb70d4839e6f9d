export { S3RestClient, type S3RestClientOptions } from './client.js';
