import { test } from '@japa/runner'
import { botEventBus, type StateChangedEvent } from '#bot/core/event_bus'
import { LanguageState, MenuState, StateTrigger } from '#bot/types/state.types'
import { buildBotStack } from '#tests/helpers/bot_stack'

test.group('UserStateMachine | first contact', () => {
  test('creates the user in the detected language with no menu', async ({ assert }) => {
    const { repository, stateMachine, detector } = buildBotStack({ detected: 'id' })

    const resolved = await stateMachine.resolve('U1', 'Apa kabar?')

    assert.isTrue(resolved.firstContact)
    assert.equal(resolved.menu, MenuState.STALE)
    assert.equal(resolved.record.preferredLanguage, 'id')
    assert.isNull(resolved.record.assignedMenuId)
    assert.equal(repository.users.get('U1')?.preferredLanguage, 'id')
    assert.deepEqual(detector.inputs, ['Apa kabar?'])
  })

  test('falls back to the default language when detection is inconclusive', async ({ assert }) => {
    const unknown = buildBotStack({ detected: 'unknown' })
    const failing = buildBotStack({ detected: new Error('detector crashed') })

    assert.equal((await unknown.stateMachine.resolve('U1', 'ok')).record.preferredLanguage, 'en')
    assert.equal((await failing.stateMachine.resolve('U1', 'ok')).record.preferredLanguage, 'en')
  })

  test('does not detect again for a known user', async ({ assert }) => {
    const { repository, stateMachine, detector } = buildBotStack({ detected: 'zh' })
    repository.seedUser('U1', 'vi', 'rm-vi')

    const resolved = await stateMachine.resolve('U1', '你好')

    assert.isFalse(resolved.firstContact)
    assert.equal(resolved.menu, MenuState.SYNCED)
    assert.equal(resolved.record.preferredLanguage, 'vi')
    assert.lengthOf(detector.inputs, 0)
  })

  test('publishes the first contact transition', async ({ assert, cleanup }) => {
    const { stateMachine } = buildBotStack({ detected: 'vi' })
    const events: StateChangedEvent[] = []
    cleanup(botEventBus.subscribe('user:state_changed', (event) => events.push(event)))

    await stateMachine.resolve('U-first-contact', 'xin chào')

    assert.lengthOf(events, 1)
    assert.equal(events[0].trigger, StateTrigger.FIRST_CONTACT)
    assert.isNull(events[0].from)
    assert.deepEqual(events[0].to, { language: LanguageState.SELECTED, menu: MenuState.STALE })
    assert.equal(events[0].language, 'vi')
  })
})

test.group('UserStateMachine | explicit language', () => {
  test('a new language clears the assigned menu', async ({ assert }) => {
    const { repository, stateMachine } = buildBotStack()
    repository.seedUser('U1', 'en', 'rm-en')

    const selection = await stateMachine.selectLanguage('U1', 'zh')

    assert.deepEqual(
      { changed: selection.changed, previous: selection.previous, firstContact: selection.firstContact },
      { changed: true, previous: 'en', firstContact: false }
    )
    assert.equal(repository.users.get('U1')?.preferredLanguage, 'zh')
    assert.isNull(repository.users.get('U1')?.assignedMenuId)
  })

  test('selecting the current language keeps the menu', async ({ assert }) => {
    const { repository, stateMachine } = buildBotStack()
    repository.seedUser('U1', 'en', 'rm-en')

    const selection = await stateMachine.selectLanguage('U1', 'en')

    assert.isFalse(selection.changed)
    assert.equal(repository.users.get('U1')?.assignedMenuId, 'rm-en')
  })

  test('selecting a language creates an unknown user', async ({ assert }) => {
    const { repository, stateMachine, detector } = buildBotStack({ detected: 'id' })

    const selection = await stateMachine.selectLanguage('U1', 'vi')

    assert.isTrue(selection.firstContact)
    assert.isNull(selection.previous)
    assert.equal(repository.users.get('U1')?.preferredLanguage, 'vi')
    assert.lengthOf(detector.inputs, 0)
  })
})

test.group('UserStateMachine | menu state', () => {
  test('a menu of another language is a consistency violation', async ({ assert, cleanup }) => {
    const { repository, stateMachine } = buildBotStack()
    repository.seedUser('U-violation', 'en', 'rm-id')
    const events: StateChangedEvent[] = []
    cleanup(botEventBus.subscribe('user:state_changed', (event) => events.push(event)))

    const resolved = await stateMachine.resolve('U-violation', 'hello')

    assert.equal(resolved.menu, MenuState.STALE)
    assert.deepEqual(
      events.map((event) => event.trigger),
      [StateTrigger.CONSISTENCY_VIOLATION]
    )
  })

  test('a retired menu is stale without a violation', async ({ assert, cleanup }) => {
    const { repository, stateMachine } = buildBotStack()
    repository.seedUser('U-retired', 'en', 'rm-retired')
    const events: StateChangedEvent[] = []
    cleanup(botEventBus.subscribe('user:state_changed', (event) => events.push(event)))

    const resolved = await stateMachine.resolve('U-retired', 'hello')

    assert.equal(resolved.menu, MenuState.STALE)
    assert.lengthOf(events, 0)
  })

  test('snapshot describes both axes', ({ assert }) => {
    const { stateMachine, repository } = buildBotStack()
    repository.seedUser('U1', 'zh', 'rm-zh')

    assert.deepEqual(stateMachine.snapshot(null), {
      language: LanguageState.NO_PREFERENCE,
      menu: MenuState.STALE,
    })
    const record = repository.users.get('U1')
    assert.deepEqual(stateMachine.snapshot(record ?? null), {
      language: LanguageState.SELECTED,
      menu: MenuState.SYNCED,
    })
  })

  test('ensureMenu syncs a stale user once', async ({ assert }) => {
    const { repository, platform, stateMachine } = buildBotStack()
    repository.seedUser('U1', 'id', null)

    const first = await stateMachine.ensureMenu('U1')
    const second = await stateMachine.ensureMenu('U1')

    assert.deepEqual(first, { ok: true, artifactId: 'rm-id', changed: true })
    assert.isNull(second)
    assert.deepEqual(platform.calls, ['link U1 rm-id'])
    assert.isNull(await stateMachine.ensureMenu('U-missing'))
  })
})
