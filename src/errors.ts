export type ProbeErrorKind =
  | 'probe-unavailable'
  | 'probe-timeout'
  | 'interface-gone'
  | 'resolver-unreadable'
  | 'ambiguous-scan'
  | 'profile-unreadable'

export class ProbeError extends Error {
  readonly kind: ProbeErrorKind

  constructor(kind: ProbeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ProbeError'
    this.kind = kind
  }
}

/** Raised before the monitoring loop starts; the dashboard never renders. */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StartupError'
  }
}

export class ConfigError extends StartupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

export const describeError = (error: unknown, fallback: string) =>
  error instanceof Error && error.message ? error.message : fallback

export const isAbortError = (error: unknown) =>
  error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')

export const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined
