export {Kiln, selectPackages, type KilnOptions, type BuildOptions, type BuildReport} from './kiln.js'
export {Scheduler, type ScheduleOptions, type ScheduleResult} from './scheduler.js'
export {RecipeRunner, type RecipeRunnerCollaborators, type RecipeRunOptions} from './recipe-runner.js'
export {RecipeLoader, parseCommand, parseRecipeFile, slugify, type RecipeFile, type RecipeLoaderOptions} from './recipe-loader.js'
export {StateManager, type RecipeState, type BuildState} from './state.js'
export {ConsoleReporter} from './reporter.js'
export type {
  Reporter,
  BuildEvent,
  BuildStartEvent,
  RecipeStartingEvent,
  RecipeLogEvent,
  CacheWarningEvent,
  RecipeFinishedEvent,
  PackageAssembledEvent,
  PackageIncompleteEvent,
  BuildFinishedEvent,
  BuildFailedEvent
} from './reporter.js'
export {
  buildGraph,
  validateRecipes,
  validatePackages,
  packageKey,
  topologicalOrder,
  topologicalLevels,
  subgraph,
  leafNodes,
  dependents,
  type RecipeGraph
} from './dag.js'
export {substitute, substituteAll, referencedVariables, type VariableScope} from './template.js'
export {buildScope, type PathBinding, type ScopeOptions} from './scope.js'
export {recipeFingerprint, sourceFingerprint, hashTree, type DependencyFingerprint, type InputDigest} from './fingerprint.js'
export {assemblePackages, writePackageManifest, readPackageManifests, type PackageAssembly} from './package-aggregator.js'
export {createBuildConfig, type BuildConfigInput} from './build-config.js'
export {loadEnvFile} from './env-file.js'
export {parseComponentRevisions, loadComponentRevisions, revisionConstants} from './revisions.js'
export {
  legalizeName,
  recipeName,
  forEachHost,
  platformTriple,
  currentPlatformTriple,
  isWindowsTriple,
  isCygwinTriple,
  isLinuxTriple,
  isMacTriple,
  isX8664Triple,
  tripleOs,
  executableName,
  type HostOs
} from './naming.js'
export {dirSize, formatSize, formatDuration} from './utils.js'
