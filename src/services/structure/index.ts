/**
 * Code Structure Module
 *
 * @module services/structure
 */

export {
  InMemoryStructureProvider,
  type CodeStructureProvider
} from './code-structure-provider.js';
export { ManifestStructureProvider } from './manifest-provider.js';
