export { ConstraintResolver, type ConstraintResolverOptions } from './constraint-resolver.js';
export {
  DependencyGraphResolver,
  type DependencyGraphResolverOptions,
  type UpdateDependenciesOptions
} from './dependency-graph-resolver.js';
export { parseRootManifest, parseRemoteManifest, parseManifestExports, type FormulaManifest } from './manifest.js';
export {
  formatRequirementLine,
  parseRequirementEntries,
  parseRequirementsText,
  readRequirementLines
} from './requirements.js';
