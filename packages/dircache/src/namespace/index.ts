export { resolveNamespace, defaultCacheRoot, namespaceDirectory } from './resolver.js';
export type { NamespaceOptions } from './types.js';
