/**
 * Dependency graph module
 * @module @commit-planner/core/graph
 */

export { buildDependencyGraph, dedupeEdges, edgeKey, type BuildGraphOptions } from './build-graph';
export {
  DEPENDENCY_RULES,
  testAfterImplementation,
  docsAfterFeature,
  fixAfterFeature,
  importDependency,
  sameScope,
} from './rules';
export {
  referencesModule,
  resolveSpecifier,
  extractJavascriptSpecifiers,
  extractPythonModules,
  javascriptModulePaths,
  pythonModuleNames,
  stripSourceExtension,
  languageOf,
  type ModuleLanguage,
} from './module-references';
