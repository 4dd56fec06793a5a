import { createInterface, type Interface } from 'node:readline'

export interface Prompt {
  ask(question: string): Promise<string>
  /** Release the input stream; later questions are rejected. */
  close(): void
}

interface PendingAnswer {
  question: string
  resolve: (answer: string) => void
  reject: (error: Error) => void
}

function inputClosed(question: string): Error {
  return new Error(`Input closed before answering "${question}"`)
}

/**
 * Blocking terminal prompt. Waits for a line of input with no timeout and no
 * default; the answer is returned as typed, apart from the line ending.
 *
 * One readline interface serves every question, so lines that arrive
 * together (piped input) are queued and handed out one per question.
 */
export function createReadlinePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompt {
  let rl: Interface | undefined
  let closed = false
  const lines: string[] = []
  const pending: PendingAnswer[] = []

  const open = (): Interface => {
    if (rl) return rl
    const created = createInterface({ input, output })
    created.on('line', (line) => {
      const next = pending.shift()
      if (next) {
        next.resolve(line)
      } else {
        lines.push(line)
      }
    })
    created.on('close', () => {
      closed = true
      for (const waiting of pending.splice(0)) {
        waiting.reject(inputClosed(waiting.question))
      }
    })
    rl = created
    return created
  }

  return {
    ask(question: string): Promise<string> {
      if (!closed) {
        const session = open()
        session.setPrompt(`${question}: `)
        session.prompt()
      }

      return new Promise((resolve, reject) => {
        const queued = lines.shift()
        if (queued !== undefined) {
          resolve(queued)
        } else if (closed) {
          reject(inputClosed(question))
        } else {
          pending.push({ question, resolve, reject })
        }
      })
    },

    close(): void {
      closed = true
      rl?.close()
    },
  }
}
