export {Workspace} from './workspace.js'
export {WorkspaceLock} from './workspace-lock.js'
export {ProcessExecutor, type LogLine, type OnLogLine} from './executor.js'
export {ExecaProcessExecutor} from './process-executor.js'
export {SourceControl} from './source-control.js'
export {GitCliSourceControl} from './git-source-control.js'
export {ArtifactStore, type StoredArtifact} from './artifact-store.js'
export {LocalArtifactStore} from './local-artifact-store.js'
export type {RunProcessRequest, RunProcessResult, SyncRequest, SyncResult} from './types.js'
