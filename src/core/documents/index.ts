export { DocumentStore, documentPath } from './store.js';
export type { DocumentState } from './store.js';
