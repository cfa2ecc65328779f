// src/main/core/platform/script-runner.ts
import { execFile, spawn } from 'child_process'
import { promisify } from 'util'

const execFileAsync = promisify(execFile)

// Clipboard images travel base64 encoded through stdout
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024

export interface ScriptRunner {
  /** Run a JavaScript for Automation script; extra args reach its run(argv) */
  jxa(script: string, args?: string[]): Promise<string>
  appleScript(script: string): Promise<string>
  /** Run a command with `input` on stdin */
  pipe(command: string, args: string[], input: Buffer): Promise<void>
}

/**
 * Escape a string for use inside an AppleScript string literal
 */
export function sanitizeAppleScriptString(str: string): string {
  return str
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
}

export const osascriptRunner: ScriptRunner = {
  async jxa(script, args = []) {
    const { stdout } = await execFileAsync('osascript', ['-l', 'JavaScript', '-e', script, ...args], {
      maxBuffer: MAX_OUTPUT_BYTES,
    })
    return stdout.trim()
  },

  async appleScript(script) {
    const { stdout } = await execFileAsync('osascript', ['-e', script])
    return stdout.trim()
  },

  pipe(command, args, input) {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        stdio: ['pipe', 'ignore', 'pipe'],
        env: { ...process.env, LANG: 'en_US.UTF-8' },
      })

      let stderr = ''
      child.stderr.setEncoding('utf8')
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk
      })
      child.on('error', reject)
      child.on('close', code => {
        if (code === 0) {
          resolve()
        } else {
          reject(new Error(`${command} exited with code ${code}: ${stderr.trim()}`))
        }
      })
      child.stdin.end(input)
    })
  },
}
