import pLimit, { type LimitFunction } from 'p-limit'

interface Lane {
  limit: LimitFunction
  holders: number
}

/**
 * Sérialise les traitements d'un même utilisateur (file à concurrence 1).
 * Des utilisateurs différents restent traités en parallèle. Une file est
 * libérée dès qu'elle n'a plus de tâche en cours ni en attente.
 */
export default class UserLockManager {
  private readonly lanes = new Map<string, Lane>()

  public async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let lane = this.lanes.get(key)
    if (!lane) {
      lane = { limit: pLimit(1), holders: 0 }
      this.lanes.set(key, lane)
    }

    lane.holders++
    try {
      return await lane.limit(task)
    } finally {
      lane.holders--
      if (lane.holders === 0) {
        this.lanes.delete(key)
      }
    }
  }

  public get activeKeys(): number {
    return this.lanes.size
  }
}
