export type OperationKind = 'shell' | 'mkdirp' | 'symlink' | 'rm' | 'append_line'

export interface ShellOperation {
  kind: 'shell'
  /**
   * Handed to `/bin/sh -c` as is. Only the exit status is relied upon.
   */
  command: string
}

export interface MkdirpOperation {
  kind: 'mkdirp'
  dir: string
}

export interface SymlinkOperation {
  kind: 'symlink'
  /**
   * What the link points at. Stored as given (absolute), never relativized.
   */
  source: string
  target: string
}

export interface RmOperation {
  kind: 'rm'
  path: string
}

export interface AppendLineOperation {
  kind: 'append_line'
  file: string
  line: string
}

export type Operation =
  | ShellOperation
  | MkdirpOperation
  | SymlinkOperation
  | RmOperation
  | AppendLineOperation

export interface SuccessRecord {
  status: 'success'
  operation: Operation
  command: string
  at: Date
}

export interface FailureRecord {
  status: 'failure'
  operation: Operation
  command: string
  at: Date
  error: string
  /**
   * Set for shell operations that exited nonzero.
   */
  exitCode?: number
}

export type OutcomeRecord = SuccessRecord | FailureRecord

export type ExecuteResult =
  | { ok: true; succeeded: SuccessRecord[] }
  | { ok: false; succeeded: SuccessRecord[]; failure: FailureRecord }

export interface Logger {
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

/**
 * Free-text question and answer on the terminal.
 */
export interface Prompter {
  /**
   * Resolves to undefined when the user cancels the prompt.
   */
  ask(message: string): Promise<string | undefined>
  /**
   * Tell the user their answer was not accepted.
   */
  error(message: string): void
}
