/**
 * endpoint-usage - find which API specification endpoints a codebase references
 *
 * Endpoints are read from an OpenAPI/Swagger path table, turned into families
 * of call-site patterns, and matched against every source file under a root
 * directory. The result lists each endpoint as used or unused together with
 * the files that reference it.
 */

// Types
export * from './types/index.js';

// Specification
export {
  loadSpecDocument,
  parseSpecDocument,
  findSpecFile,
  extractEndpoints,
  parseHttpMethod,
  createEndpoint,
  endpointKey,
  formatEndpoint,
  compareEndpoints,
  type SpecDocument,
  type PathTable,
} from './openapi/index.js';

// Analyzer
export {
  EndpointAnalyzer,
  compilePatternTable,
  compileEndpointPatterns,
  pathToPattern,
  discoverFiles,
  isCandidateFile,
  ContentScanner,
  matchContent,
  aggregateUsage,
  filterResults,
  sortResults,
  compileFilterPattern,
  type AnalyzerOptions,
  type PatternEntry,
  type PatternTable,
  type IdiomVariant,
  type MethodCase,
  type DiscoveryOptions,
  type ScannerOptions,
  type ResultFilter,
} from './analyzer/index.js';

// Reports
export { formatReport, type ReportContext } from './report/index.js';

// Logging
export { createLogger, silentLogger, type Logger, type LogLevel } from './logger.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
  type OutputFormat,
} from './config/index.js';
