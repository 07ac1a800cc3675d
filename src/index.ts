/**
 * Conformance checks for S3-compatible object storage servers
 *
 * Builds signed ListObjects (V1) and ListMultipartUploads requests, sends
 * them, and compares each response with a result computed from a known
 * fixture population.
 *
 * @example
 * ```typescript
 * import {
 *   createConfigFromEnv,
 *   createServerConfig,
 *   createFixtureContext,
 *   runConformance,
 *   ConsoleReporter,
 * } from 's3-conformance';
 *
 * const config = createServerConfig(createConfigFromEnv());
 * const fixtures = createFixtureContext({ bucket: 'conformance', objects, uploads });
 * const reports = await runConformance(config, fixtures, { reporter: new ConsoleReporter() });
 * ```
 *
 * @module s3-conformance
 */

// Configuration
export {
  GLOBAL_DEFAULT_REGION,
  AMAZON_DEFAULT_REGION,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_EXPECTED_STATUS,
  parseEndpoint,
  isAmazonEndpoint,
  getAmazonS3Host,
  validateConfig,
  normalizeConfig,
  resolveRegion,
  ServerConfigBuilder,
  createConfigFromEnv,
  ENV_VARS,
  createServerConfig,
  closeServerConfig,
} from './config/index.js';
export type {
  ServerConfig,
  ServerConfigOptions,
  ServerSettings,
  ServerConfigDependencies,
} from './config/index.js';

// Errors
export {
  ConformanceError,
  ConfigError,
  SigningError,
  TransportError,
  VerificationError,
  isConformanceError,
  isErrorKind,
  wrapError,
} from './errors/index.js';
export type { ConformanceErrorKind, ConformanceErrorParams } from './errors/index.js';

// Logging
export { ConsoleLogger, NoopLogger, createLogger, formatLogLine } from './observability/index.js';
export type { Logger, LogLevel, LogContext } from './observability/index.js';

// Signing
export { SignatureV4Signer, EMPTY_SHA256 } from './signing/index.js';
export type { HttpMethod, SignedRequest } from './signing/index.js';

// Requests
export { makeTargetUrl, computeHash, buildSignedRequest, toHttpRequest } from './request/index.js';
export type { QueryParameters, ContentHash, PayloadSource, RequestSpec } from './request/index.js';

// Transport
export {
  FetchTransport,
  createFetchTransport,
  TracingTransport,
  getHeader,
  getStatusLine,
} from './transport/index.js';
export type { HttpRequest, HttpResponse, HttpTransport } from './transport/index.js';

// Responses
export {
  parseListObjectsV1Response,
  parseListMultipartUploadsResponse,
  parseErrorResponse,
} from './xml/index.js';
export type {
  ListBucketResult,
  ListedObject,
  ListMultipartUploadsResult,
  ListedUpload,
  CommonPrefix,
  ParsedError,
} from './xml/index.js';

// Fixtures
export { createFixtureContext } from './fixtures/index.js';
export type {
  ObjectInfo,
  ObjectMultipartInfo,
  FixtureContext,
  FixtureContextOptions,
} from './fixtures/index.js';

// Verification
export { verifyResponse, verifyListing, countMatches } from './verify/index.js';
export type { ListingExpectation, BodyCheck } from './verify/index.js';

// Operations
export {
  ALL_OPERATIONS,
  listObjectsV1,
  listMultipartUploads,
  buildExpectedListBucketResult,
  buildExpectedMultipartUploads,
  LIST_OBJECTS_MAX_KEYS,
} from './operations/index.js';
export type { ConformanceOperation, OperationVariant } from './operations/index.js';

// Driver
export {
  ConformanceRunner,
  runConformance,
  ConsoleReporter,
  CollectingReporter,
  formatTestLabel,
} from './driver/index.js';
export type { TestReport, TestPhase, Reporter, RunnerOptions } from './driver/index.js';
