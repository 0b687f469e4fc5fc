import {RunCommand, type RunOptions} from './builtin/run.js'
import {
  CopyCommand,
  CopyRecursiveCommand,
  CopyTreeCommand,
  MkdirCommand,
  MoveCommand,
  RemoveCommand,
  RemoveDirectoryCommand,
  WriteDataCommand
} from './builtin/filesystem.js'
import {RunnableCommand, type RunnableFunction} from './builtin/runnable.js'
import {SyncGitCommand, type SyncGitOptions} from './builtin/sync-git.js'
import {SkipForIncrementalCommand} from './builtin/skip-for-incremental.js'
import type {Command} from './command.js'

export {Command, type CommandContext, type CommandDescription, type JsonValue} from './command.js'
export {
  RunCommand,
  CopyCommand,
  CopyTreeCommand,
  CopyRecursiveCommand,
  MkdirCommand,
  MoveCommand,
  RemoveCommand,
  RemoveDirectoryCommand,
  WriteDataCommand,
  RunnableCommand,
  SyncGitCommand,
  SkipForIncrementalCommand
}
export {canonicalUrl} from './builtin/sync-git.js'
export type {RunOptions, RunnableFunction, SyncGitOptions}

// Factories used by recipe tables written in code

export function run(argv: string[], options?: RunOptions): Command {
  return new RunCommand(argv, options)
}

export function copy(src: string, dst: string): Command {
  return new CopyCommand(src, dst)
}

export function copyTree(src: string, dst: string): Command {
  return new CopyTreeCommand(src, dst)
}

export function copyRecursive(src: string, dst: string): Command {
  return new CopyRecursiveCommand(src, dst)
}

export function mkdir(path: string, options: {parents?: boolean} = {}): Command {
  return new MkdirCommand(path, options.parents ?? false)
}

export function move(src: string, dst: string): Command {
  return new MoveCommand(src, dst)
}

export function remove(...paths: string[]): Command {
  return new RemoveCommand(...paths)
}

export function removeDirectory(path: string): Command {
  return new RemoveDirectoryCommand(path)
}

export function writeData(data: string, dst: string): Command {
  return new WriteDataCommand(data, dst)
}

export function runnable(name: string, fn: RunnableFunction, ...args: string[]): Command {
  return new RunnableCommand(name, fn, ...args)
}

export function syncGit(options: SyncGitOptions): Command {
  return new SyncGitCommand(options)
}

export function skipForIncremental(...commands: Command[]): Command {
  return new SkipForIncrementalCommand(commands)
}
