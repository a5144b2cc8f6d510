export type Frame = Readonly<{
  /** `path:line:column`, or a shortened core module name once folded. */
  location: string

  /** Function or method name; `<fn>` for anonymous frames. */
  member: string

  /** Whether the frame belongs to the Node.js runtime (`node:` modules). */
  isCore: boolean
}>

export type FoldOptions = {
  /** Also fold runtime frames and shorten their locations to the module name. */
  terse?: boolean
}

const FRAME_WITH_MEMBER = /^\s*at (.+?) \((.+)\)$/
const FRAME_WITHOUT_MEMBER = /^\s*at (.+)$/
const CORE_MODULE = /^node:[^/:]+/

const ANONYMOUS_MEMBER = "<fn>"

/**
 * An ordered, immutable list of stack frames, innermost first.
 */
export class Trace {
  readonly frames: readonly Frame[]

  constructor(frames: readonly Frame[]) {
    this.frames = Object.freeze([...frames])
  }

  /**
   * Parses a V8 stack string. The message header and any line that is not
   * an `at ...` frame are skipped.
   */
  static from(stack: string): Trace {
    const frames: Frame[] = []

    for (const line of stack.split("\n")) {
      const frame = parseFrame(line)
      if (frame) frames.push(frame)
    }

    return new Trace(frames)
  }

  /** The stack of the caller. */
  static current(): Trace {
    const trace = Trace.from(new Error().stack ?? "")

    return new Trace(trace.frames.slice(1))
  }

  /**
   * Replaces every contiguous run of folded frames with a single frame, the
   * outermost of the run.
   *
   * @param predicate - frames for which this returns `true` are folded
   */
  foldFrames(predicate: (frame: Frame) => boolean, opts: FoldOptions = {}): Trace {
    const terse = opts.terse ?? false
    const shouldFold = (frame: Frame) => predicate(frame) || (terse && frame.isCore)

    const kept: Frame[] = []
    let previousFolded = false

    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i]
      if (!frame) continue

      const fold = shouldFold(frame)
      if (fold && previousFolded) continue

      previousFolded = fold
      kept.push(fold && terse && frame.isCore ? shortenCoreFrame(frame) : frame)
    }

    return new Trace(kept.reverse())
  }

  /** One frame per line: the location column padded, then the member. */
  toString(): string {
    const width = Math.max(0, ...this.frames.map((f) => f.location.length))

    return this.frames.map((f) => `${f.location.padEnd(width)}  ${f.member}\n`).join("")
  }
}

function parseFrame(line: string): Frame | undefined {
  const withMember = FRAME_WITH_MEMBER.exec(line)
  if (withMember?.[1] && withMember[2]) {
    return makeFrame(withMember[2], withMember[1])
  }

  const bare = FRAME_WITHOUT_MEMBER.exec(line)
  if (bare?.[1]) {
    return makeFrame(bare[1], ANONYMOUS_MEMBER)
  }

  return undefined
}

function makeFrame(location: string, member: string): Frame {
  return { location, member, isCore: location.startsWith("node:") }
}

function shortenCoreFrame(frame: Frame): Frame {
  const module = CORE_MODULE.exec(frame.location)?.[0]

  return module ? { ...frame, location: module } : frame
}
