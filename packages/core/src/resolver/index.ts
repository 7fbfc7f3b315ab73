export { resolveTask, resolveCategory, resolveCategoryScope } from './identifier-resolver.js';
export type { ResolverStore, CategoryScope } from './identifier-resolver.js';
