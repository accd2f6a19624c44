import { test } from '@japa/runner'
import MenuRegistry from '#bot/core/rich_menu/menu_registry'
import { artifactFor, frozenRegistry } from '#tests/helpers/bot_stack'

test.group('MenuRegistry', () => {
  test('maps languages and artifact ids both ways', ({ assert }) => {
    const registry = new MenuRegistry()
    registry.populate([artifactFor('id'), artifactFor('en')], ['rm-old'])

    assert.equal(registry.get('id')?.artifactId, 'rm-id')
    assert.equal(registry.languageOf('rm-en'), 'en')
    assert.isUndefined(registry.languageOf('rm-zh'))
    assert.isTrue(registry.isRetired('rm-old'))
    assert.deepEqual(registry.missingLanguages(['id', 'zh', 'en', 'vi']), ['zh', 'vi'])
  })

  test('refuses to be repopulated once frozen', ({ assert }) => {
    const registry = frozenRegistry()

    assert.isTrue(registry.isFrozen)
    assert.throws(
      () => registry.populate([artifactFor('id')]),
      'Menu registry is frozen; use extend() to add a language'
    )
  })

  test('extend replaces an entry and retires the previous artifact', async ({ assert }) => {
    const registry = frozenRegistry()

    await registry.extend({ artifactId: 'rm-id-2', language: 'id', name: 'pelita-id-v2', layoutVersion: 2 })

    assert.equal(registry.get('id')?.artifactId, 'rm-id-2')
    assert.equal(registry.languageOf('rm-id-2'), 'id')
    assert.isUndefined(registry.languageOf('rm-id'))
    assert.isTrue(registry.isRetired('rm-id'))
  })

  test('snapshot is a copy', ({ assert }) => {
    const registry = frozenRegistry()
    const snapshot = registry.snapshot()
    snapshot.entries[0].artifactId = 'changed'

    assert.isTrue(snapshot.frozen)
    assert.deepEqual(snapshot.retired, ['rm-retired'])
    assert.deepEqual(
      registry.snapshot().entries.map((entry) => entry.artifactId),
      ['rm-id', 'rm-zh', 'rm-en', 'rm-vi']
    )
  })
})
