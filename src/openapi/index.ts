/**
 * OpenAPI module exports
 */

export {
  specDocumentSchema,
  specInfoSchema,
  type SpecDocument,
  type SpecInfo,
} from './schema.js';

export {
  SPEC_FILE_NAMES,
  isRemoteSource,
  parseSpecDocument,
  loadSpecDocument,
  findSpecFile,
} from './loader.js';

export {
  parseHttpMethod,
  createEndpoint,
  endpointKey,
  formatEndpoint,
  compareEndpoints,
  extractEndpoints,
  type PathTable,
} from './endpoints.js';
