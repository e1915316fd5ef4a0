import type { MessageWriter, RecordMessage } from "../ports/log-record"

/**
 * Scratch space a message is rendered into before it is matched.
 */
export class RenderBuffer implements MessageWriter {
  private readonly chunks: string[] = []
  private size = 0

  get length(): number {
    return this.size
  }

  write(chunk: string): void {
    if (chunk.length === 0) return
    this.chunks.push(chunk)
    this.size += chunk.length
  }

  clear(): void {
    this.chunks.length = 0
    this.size = 0
  }

  toString(): string {
    return this.chunks.join("")
  }
}

/**
 * Hands out render buffers, one per in-flight call.
 *
 * @remarks
 * Filtering is synchronous, so a single buffer normally serves every call.
 * A second one is only allocated when a message formatter logs through the
 * same filter while its own message is being rendered.
 */
export class RenderBufferPool {
  private readonly free: RenderBuffer[] = []
  private allocated = 0

  constructor(private readonly maxIdle: number = 4) {}

  /** Number of buffers created over the pool's lifetime. */
  get size(): number {
    return this.allocated
  }

  /** Number of buffers waiting to be reused. */
  get idle(): number {
    return this.free.length
  }

  use<T>(fn: (buffer: RenderBuffer) => T): T {
    const buffer = this.acquire()

    try {
      return fn(buffer)
    } finally {
      this.release(buffer)
    }
  }

  private acquire(): RenderBuffer {
    const buffer = this.free.pop()
    if (buffer) return buffer

    this.allocated++
    return new RenderBuffer()
  }

  private release(buffer: RenderBuffer): void {
    buffer.clear()
    if (this.free.length < this.maxIdle) this.free.push(buffer)
  }
}

export function writeMessage(message: RecordMessage, out: MessageWriter): void {
  if (typeof message === "string") {
    out.write(message)
    return
  }

  message(out)
}

/**
 * Renders a record message to a string, for drains that print it.
 */
export function renderMessage(message: RecordMessage): string {
  if (typeof message === "string") return message

  const buffer = new RenderBuffer()
  message(buffer)

  return buffer.toString()
}
