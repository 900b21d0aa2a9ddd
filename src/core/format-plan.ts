import { Operation } from '../types.js'

function quote(s: string) {
  return `'${s.replace(/'/g, `'\\''`)}'`
}

/**
 * One-line command text for an operation, as shown on screen and in the audit log.
 */
export function describeOperation(op: Operation): string {
  switch (op.kind) {
    case 'shell':
      return op.command
    case 'mkdirp':
      return `mkdir -p ${op.dir}`
    case 'symlink':
      return `ln -s ${op.source} ${op.target}`
    case 'rm':
      return `rm -f ${op.path}`
    case 'append_line':
      return `echo ${quote(op.line)} >> ${op.file}`
    default: {
      const _exhaustive: never = op
      throw new Error(`Unknown operation: ${JSON.stringify(_exhaustive)}`)
    }
  }
}

export function formatPlan(ops: readonly Operation[]): string {
  if (!ops.length) return 'Nothing to do.'
  return ops.map((op, i) => `${i + 1}. ${describeOperation(op)}`).join('\n')
}
