import type {RunProcessRequest, RunProcessResult} from './types.js'

/**
 * Log line from process execution.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during process execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface for running external programs.
 *
 * Implementations:
 * - `ExecaProcessExecutor`: spawns local processes through execa
 * - Test doubles recording invocations
 *
 * The executor is responsible for:
 * - Running the program in the requested working directory
 * - Streaming logs in real-time and redirecting them to files when asked
 * - Enforcing the timeout
 *
 * A non-zero exit is reported through `exitCode`, never thrown.
 */
export abstract class ProcessExecutor {
  /**
   * Runs a program to completion.
   * @param request - Program, arguments, working directory and environment
   * @param onLogLine - Callback for real-time stdout/stderr logs
   * @returns Execution result with exitCode, timestamps, and optional error
   */
  abstract run(request: RunProcessRequest, onLogLine: OnLogLine): Promise<RunProcessResult>
}
