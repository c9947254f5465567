import { createLogger } from '../logger'
const logger = createLogger('queue')

export type Task = () => void

/**
 * Serial execution context of one connection: tasks run one at a time, in
 * the order they were dispatched, on a later turn of the event loop. A task
 * never runs inside another one.
 */
export default class SerialQueue {
  private tasks: Task[] = []
  private scheduled = false

  public get pending(): number {
    return this.tasks.length
  }

  public dispatch(task: Task): void {
    this.tasks.push(task)
    this.schedule()
  }

  private schedule(): void {
    if (this.scheduled) return
    this.scheduled = true
    setImmediate(() => {
      this.scheduled = false
      this.drain()
    })
  }

  private drain(): void {
    // tasks dispatched while draining wait for the next turn
    let count = this.tasks.length
    for (let i = 0; i < count; i++) {
      let task = this.tasks.shift()
      if (!task) break
      try {
        task()
      } catch (e) {
        logger.error({ err: e }, 'task failed')
      }
    }
    if (this.tasks.length) this.schedule()
  }
}
