import {createWriteStream, type WriteStream} from 'node:fs'
import {execa} from 'execa'
import type {RunProcessRequest, RunProcessResult} from './types.js'
import {ProcessExecutor, type OnLogLine} from './executor.js'

export class ExecaProcessExecutor extends ProcessExecutor {
  async run(request: RunProcessRequest, onLogLine: OnLogLine): Promise<RunProcessResult> {
    const startedAt = new Date()
    const [file, ...args] = request.argv
    const stdoutLog = request.stdoutPath ? createWriteStream(request.stdoutPath) : undefined
    const stderrLog = request.stderrPath ? createWriteStream(request.stderrPath) : undefined

    let exitCode = 0
    let error: string | undefined

    try {
      const proc = execa(file, args, {
        cwd: request.cwd,
        env: request.env,
        stdin: 'ignore',
        reject: false,
        timeout: request.timeoutSec ? request.timeoutSec * 1000 : undefined
      })

      const stdoutDone = (async () => {
        for await (const line of proc.iterable({from: 'stdout'})) {
          stdoutLog?.write(line + '\n')
          onLogLine({stream: 'stdout', line})
        }
      })()

      const stderrDone = (async () => {
        for await (const line of proc.iterable({from: 'stderr'})) {
          stderrLog?.write(line + '\n')
          onLogLine({stream: 'stderr', line})
        }
      })()

      const [result] = await Promise.all([proc, stdoutDone, stderrDone])
      if (result.timedOut) {
        exitCode = result.exitCode ?? 124
        error = `Timed out after ${request.timeoutSec ?? 0}s`
      } else if (result.exitCode === undefined) {
        exitCode = 127
        error = `Could not run ${file}`
      } else {
        exitCode = result.exitCode
      }
    } catch (error_) {
      exitCode = 1
      error = error_ instanceof Error ? error_.message : String(error_)
    } finally {
      await closeStream(stdoutLog)
      await closeStream(stderrLog)
    }

    return {exitCode, startedAt, finishedAt: new Date(), error}
  }
}

async function closeStream(stream: WriteStream | undefined): Promise<void> {
  if (!stream || stream.destroyed) {
    return
  }

  return new Promise((resolve, reject) => {
    stream.end(() => {
      resolve()
    })
    stream.on('error', reject)
  })
}
