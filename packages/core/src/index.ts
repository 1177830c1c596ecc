/**
 * @harbormaster/core
 *
 * Backend-agnostic container orchestration over the docker CLI and the
 * Docker Engine HTTP API.
 */

// Facade
export { Orchestration, createOrchestration } from './Orchestration';
export type { OrchestrationOptions } from './Orchestration';

// Adapters
export type { Adapter, BackendType } from './adapters/Adapter';
export { DockerCliAdapter } from './adapters/DockerCliAdapter';
export type { DockerCliAdapterOptions } from './adapters/DockerCliAdapter';
export { DockerApiAdapter } from './adapters/DockerApiAdapter';
export type { DockerApiAdapterOptions } from './adapters/DockerApiAdapter';
export { NodeProcessRunner } from './adapters/ProcessRunner';
export type { ProcessResult, ProcessRunOptions, ProcessRunner } from './adapters/ProcessRunner';
export { NodeHttpTransport, DEFAULT_DOCKER_SOCKET } from './adapters/HttpTransport';
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  NodeHttpTransportOptions,
} from './adapters/HttpTransport';

// Models
export { Container, ContainerJsonSchema } from './models/Container';
export type { ContainerJson } from './models/Container';
export { Network, NetworkJsonSchema } from './models/Network';
export type { NetworkJson } from './models/Network';
export { Stats, StatsJsonSchema, ZERO_IO } from './models/Stats';
export type { IOStats, StatsField, StatsInit, StatsJson } from './models/Stats';

// Parsers
export { parseIOStats, parseSize, UNIT_MULTIPLIERS } from './parsers/units';
export {
  parseLabels,
  parsePercentage,
  parseContainerLines,
  parseNetworkLines,
  parseStatsLines,
} from './parsers/cliOutput';
export { decodeApiContainers, decodeApiNetworks, decodeApiStats } from './parsers/apiResponses';
export { demuxStream } from './parsers/multiplexed';
export type { DemuxedOutput } from './parsers/multiplexed';

// Builders
export {
  TIMEOUT_EXIT_CODE,
  filterEnvKey,
  quoteToken,
  buildRunArguments,
  buildExecInvocation,
} from './builders/arguments';
export type { Invocation } from './builders/arguments';
export { buildCreateContainerBody, encodeRegistryAuth } from './builders/requestBody';
export type { CreateContainerBody, HostConfigBody } from './builders/requestBody';

// Types
export { DEFAULT_ADAPTER_CONFIG, resolveAdapterConfig } from './types/config';
export type { AdapterConfig } from './types/config';
export {
  OrchestrationError,
  BackendInvocationError,
  TimeoutError,
  ParseError,
  ValidationError,
  errorMessage,
} from './types/errors';
export type { OrchestrationErrorCode, InvocationDetails } from './types/errors';
export type {
  Filters,
  RunSpec,
  ExecSpec,
  ExecuteResult,
  ListOptions,
  StatsOptions,
  CreateNetworkOptions,
  NetworkDisconnectOptions,
  RemoveOptions,
  RegistryCredentials,
} from './types/specs';

// Logging
export { createLogger, createNullLogger } from './services/Logger';
export type { ILogger, LogLevel, LoggerOptions } from './services/Logger';
