export { ModuleResolver, buildSearchRoots, candidateFiles } from './resolver.js';
export { querySearchPath, parseSearchPathOutput, SEARCH_PATH_QUERY, DEFAULT_QUERY_TIMEOUT_MS } from './interpreter.js';
export type { SearchPathQuery, SearchPathQueryOptions, FileRunner } from './interpreter.js';
export type { SearchLayer, SearchRoot, ResolvedModule, FileProbe } from './types.js';
