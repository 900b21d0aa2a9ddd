import { Operation } from '../types.js'

/**
 * Ordered operations for one stage of a workflow.
 *
 * Sub-plan builders append to a plan they are handed; the executor takes the
 * operations out with `drain()`, which leaves the plan empty whatever the
 * outcome of the run.
 */
export class Plan {
  private ops: Operation[] = []

  add(op: Operation): this {
    this.ops.push(op)
    return this
  }

  get size(): number {
    return this.ops.length
  }

  get operations(): readonly Operation[] {
    return this.ops
  }

  drain(): Operation[] {
    const taken = this.ops
    this.ops = []
    return taken
  }
}
