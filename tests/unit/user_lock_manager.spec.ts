import { test } from '@japa/runner'
import { setTimeout as sleep } from 'node:timers/promises'
import UserLockManager from '#bot/core/managers/user_lock_manager'

test.group('UserLockManager', () => {
  test('runs tasks of the same user one at a time', async ({ assert }) => {
    const locks = new UserLockManager()
    const steps: string[] = []

    await Promise.all([
      locks.run('U1', async () => {
        steps.push('a:start')
        await sleep(20)
        steps.push('a:end')
      }),
      locks.run('U1', async () => {
        steps.push('b:start')
        steps.push('b:end')
      }),
    ])

    assert.deepEqual(steps, ['a:start', 'a:end', 'b:start', 'b:end'])
    assert.equal(locks.activeKeys, 0)
  })

  test('lets different users proceed in parallel', async ({ assert }) => {
    const locks = new UserLockManager()
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })

    const first = locks.run('U1', async () => {
      await gate
      return 'U1 done'
    })
    const second = locks.run('U2', async () => {
      release()
      return 'U2 done'
    })

    assert.deepEqual(await Promise.all([first, second]), ['U1 done', 'U2 done'])
  })

  test('releases the lane when a task fails', async ({ assert }) => {
    const locks = new UserLockManager()

    const failure = await locks
      .run('U1', async () => {
        throw new Error('boom')
      })
      .then(
        () => null,
        (error: unknown) => error
      )

    assert.instanceOf(failure, Error)
    assert.equal(locks.activeKeys, 0)
    assert.equal(await locks.run('U1', async () => 'next'), 'next')
  })
})
