export { HttpActionCaller, type ActionCaller, type ActionResponse } from './action';
export { splitIntoChunks, type TextChunk } from './chunking';
export { DocumentTextExtractor, isPdf, readPdfText, type PdfReader, type TextExtractor } from './extraction';
export {
  HttpSandbox,
  assertSandboxSucceeded,
  formatSandboxError,
  formatSandboxOutput,
  type Sandbox,
  type SandboxFile,
  type SandboxResult,
  type SandboxRunOptions,
} from './code-interpreter';
export {
  ActionSpecError,
  buildActionRequest,
  operationToolSchema,
  parseOperations,
  validateActionArguments,
  type ActionOperation,
  type ActionParameter,
  type ActionRequest,
  type HttpMethod,
} from './openapi';
export {
  ChunkRetriever,
  buildCitationAnnotations,
  formatRetrievalOutput,
  parseRetrievalOutput,
  selectSources,
  tokenize,
  type RetrievalHit,
  type RetrievalQuery,
  type RetrievalSource,
  type Retriever,
} from './retrieval';
