/**
 * Error taxonomy of the generator.
 *
 * Source and link errors are collected into reports; mapping and assembly
 * errors abort a run.
 */

export type ErrorCode =
  | 'FetchTimeout'
  | 'FetchError'
  | 'ReadError'
  | 'UnrecognizedFormat'
  | 'UnsupportedProtocol'
  | 'MalformedLink'
  | 'PortConflict'
  | 'PortRangeExceeded'
  | 'UnknownNodeReference'
  | 'EmptyNodeSet'
  | 'TemplateError'
  | 'GenerationAborted'

export abstract class GeneratorError extends Error {
  abstract readonly code: ErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class FetchTimeout extends GeneratorError {
  readonly code = 'FetchTimeout'

  constructor(readonly url: string, readonly attempts: number, options?: { cause?: unknown }) {
    super(`Timed out fetching ${url} after ${attempts} attempt(s)`, options)
  }
}

export class FetchError extends GeneratorError {
  readonly code = 'FetchError'

  constructor(readonly url: string, readonly attempts: number, detail: string, options?: { cause?: unknown }) {
    super(`Failed to fetch ${url} after ${attempts} attempt(s): ${detail}`, options)
  }
}

export class ReadError extends GeneratorError {
  readonly code = 'ReadError'

  constructor(readonly path: string, detail: string, options?: { cause?: unknown }) {
    super(`Cannot read ${path}: ${detail}`, options)
  }
}

export class UnrecognizedFormat extends GeneratorError {
  readonly code = 'UnrecognizedFormat'

  constructor(readonly preview: string) {
    super(`Content format not recognized: ${preview}`)
  }
}

export class UnsupportedProtocol extends GeneratorError {
  readonly code = 'UnsupportedProtocol'

  constructor(readonly scheme: string) {
    super(scheme ? `Unsupported protocol: ${scheme}` : 'Not a proxy link')
  }
}

export class MalformedLink extends GeneratorError {
  readonly code = 'MalformedLink'
}

export class PortConflict extends GeneratorError {
  readonly code = 'PortConflict'

  constructor(readonly port: number, detail: string) {
    super(`Port ${port} conflicts with ${detail}`)
  }
}

export class PortRangeExceeded extends GeneratorError {
  readonly code = 'PortRangeExceeded'

  constructor(readonly port: number) {
    super(`Port ${port} is outside 1-65535`)
  }
}

export class UnknownNodeReference extends GeneratorError {
  readonly code = 'UnknownNodeReference'

  constructor(readonly reference: string) {
    super(`Port mapping references a node that is not in the merged set: ${reference}`)
  }
}

export class EmptyNodeSet extends GeneratorError {
  readonly code = 'EmptyNodeSet'

  constructor() {
    super('No proxy nodes available, but the template requires at least one')
  }
}

export class TemplateError extends GeneratorError {
  readonly code = 'TemplateError'
}

export class GenerationAborted extends GeneratorError {
  readonly code = 'GenerationAborted'

  constructor(options?: { cause?: unknown }) {
    super('Generation aborted', options)
  }
}

export function isGeneratorError(error: unknown): error is GeneratorError {
  return error instanceof GeneratorError
}
