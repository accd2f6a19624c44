import { test } from '@japa/runner'
import { DateTime } from 'luxon'
import { SUPPORTED_LANGUAGES } from '#bot/types/bot_types'
import { artifactFor, buildBotStack } from '#tests/helpers/bot_stack'

const LANGUAGE_LIST = 'id (Bahasa Indonesia), zh (中文), en (English), vi (Tiếng Việt)'

test.group('ResponseRouter | canned replies', () => {
  test('first greeting is answered in the detected language and the menu follows', async ({
    assert,
  }) => {
    const { router, repository, platform } = buildBotStack({ detected: 'id' })

    const reply = await router.handle('U1', 'Halo')

    assert.deepEqual(reply, {
      text: 'Halo! 👋 Saya Pelita. Ada yang bisa saya bantu?',
      language: 'id',
      source: 'canned',
    })
    assert.equal(repository.users.get('U1')?.preferredLanguage, 'id')
    assert.equal(repository.users.get('U1')?.assignedMenuId, 'rm-id')
    assert.deepEqual(platform.calls, ['link U1 rm-id'])
  })

  test('emergency keywords list the emergency numbers', async ({ assert }) => {
    const { router, repository } = buildBotStack()
    repository.seedUser('U1', 'en', 'rm-en')

    const reply = await router.handle('U1', 'There was an accident at the factory')

    assert.equal(reply.source, 'canned')
    assert.equal(
      reply.text,
      [
        '🚨 Emergency numbers (Taiwan):',
        'Police: 110',
        'Fire / Ambulance: 119',
        '',
        'If you are in danger right now, call 110 or 119.',
      ].join('\n')
    )
  })

  test('a menu sync failure does not change the reply', async ({ assert }) => {
    const { router, repository, platform } = buildBotStack({ detected: 'en' })
    platform.failing = true

    const reply = await router.handle('U1', 'hello')

    assert.equal(reply.text, "Hello! 👋 I'm Pelita. How can I help you today?")
    assert.isNull(repository.users.get('U1')?.assignedMenuId)
  })
})

test.group('ResponseRouter | commands', () => {
  test('/help lists the commands, whatever follows', async ({ assert }) => {
    const { router } = buildBotStack()

    const reply = await router.handle('U1', '/help emergency')

    assert.equal(reply.source, 'command')
    assert.equal(
      reply.text,
      [
        '📖 Commands:',
        `/lang <code> - change language (${LANGUAGE_LIST})`,
        '/help - show this message',
        '/emergency - emergency numbers',
        '/clear - clear conversation history',
      ].join('\n')
    )
  })

  test('/lang switches language and menu within the same turn', async ({ assert }) => {
    const { router, repository, platform } = buildBotStack()
    repository.seedUser('U1', 'en', 'rm-en')

    const reply = await router.handle('U1', '/lang vi')

    assert.deepEqual(reply, {
      text: '✅ Đã chuyển ngôn ngữ sang 🇻🇳 Tiếng Việt.',
      language: 'vi',
      source: 'command',
    })
    assert.equal(repository.users.get('U1')?.preferredLanguage, 'vi')
    assert.equal(repository.users.get('U1')?.assignedMenuId, 'rm-vi')
    assert.deepEqual(platform.calls, ['link U1 rm-vi'])

    const next = await router.handle('U1', 'xin chào')

    assert.equal(next.text, 'Xin chào! 👋 Tôi là Pelita. Tôi có thể giúp gì cho bạn?')
    assert.deepEqual(platform.calls, ['link U1 rm-vi'])
  })

  test('/lang unlinks the previous menu on platforms without atomic reassignment', async ({
    assert,
  }) => {
    const { router, repository, platform } = buildBotStack({ atomic: false })
    repository.seedUser('U1', 'en', 'rm-en')

    await router.handle('U1', '/lang vi')

    assert.deepEqual(platform.calls, ['unlink U1', 'link U1 rm-vi'])
    assert.equal(repository.users.get('U1')?.assignedMenuId, 'rm-vi')
  })

  test('after /lang {$self} the user keeps that language and its menu')
    .with([...SUPPORTED_LANGUAGES])
    .run(async ({ assert }, language) => {
      const { router, repository } = buildBotStack()
      repository.seedUser('U1', language === 'en' ? 'vi' : 'en', null)

      await router.handle('U1', `/lang ${language}`)
      const next = await router.handle('U1', 'hello')

      assert.equal(next.language, language)
      assert.equal(repository.users.get('U1')?.preferredLanguage, language)
      assert.equal(repository.users.get('U1')?.assignedMenuId, artifactFor(language).artifactId)
    })

  test('/lang as first message welcomes the user without detection', async ({ assert }) => {
    const { router, repository, detector, platform } = buildBotStack({ detected: 'id' })

    const reply = await router.handle('U1', '/lang zh')

    assert.equal(
      reply.text,
      '您好！👋 我是 Pelita，在台移工的小幫手。\n可以問我工作、文件、醫療或生活上的問題。輸入 /help 查看功能。'
    )
    assert.equal(reply.language, 'zh')
    assert.lengthOf(detector.inputs, 0)
    assert.equal(repository.users.get('U1')?.preferredLanguage, 'zh')
    assert.deepEqual(platform.calls, ['link U1 rm-zh'])
  })

  test('/lang with an unknown code keeps the language and skips the menu sync', async ({
    assert,
  }) => {
    const { router, repository, platform } = buildBotStack()
    repository.seedUser('U1', 'en', null)

    const reply = await router.handle('U1', '/lang zz')

    assert.deepEqual(reply, {
      text: `❌ "zz" is not a supported language.\nValid codes: ${LANGUAGE_LIST}`,
      language: 'en',
      source: 'invalid_argument',
    })
    assert.equal(repository.users.get('U1')?.preferredLanguage, 'en')
    assert.isNull(repository.users.get('U1')?.assignedMenuId)
    assert.deepEqual(platform.calls, [])
  })

  test('/lang without argument offers every language', async ({ assert }) => {
    const { router, repository } = buildBotStack()
    repository.seedUser('U1', 'en', 'rm-en')

    const reply = await router.handle('U1', '/lang')

    assert.equal(
      reply.text,
      [
        '🌐 Choose your language:',
        '🇮🇩 Bahasa Indonesia (/lang id)',
        '🇹🇼 中文 (/lang zh)',
        '🇬🇧 English (/lang en)',
        '🇻🇳 Tiếng Việt (/lang vi)',
      ].join('\n')
    )
    assert.deepEqual(reply.quickReplies?.[0], { label: '🇮🇩 Bahasa Indonesia', text: '/lang id' })
    assert.lengthOf(reply.quickReplies ?? [], 4)
  })

  test('/clear empties the history and leaves language and menu alone', async ({ assert }) => {
    const { router, repository, conversations, platform } = buildBotStack()
    repository.seedUser('U1', 'en', 'rm-en')
    repository.turns.push(
      { userId: 'U1', role: 'user', content: 'question', language: 'en', createdAt: DateTime.now() },
      { userId: 'U1', role: 'assistant', content: 'answer', language: 'en', createdAt: DateTime.now() }
    )

    const reply = await router.handle('U1', '/clear')

    assert.equal(reply.text, '🧹 Conversation history cleared.')
    assert.lengthOf(await conversations.window('U1'), 0)
    assert.equal(repository.users.get('U1')?.preferredLanguage, 'en')
    assert.equal(repository.users.get('U1')?.assignedMenuId, 'rm-en')
    assert.deepEqual(platform.calls, [])
  })
})

test.group('ResponseRouter | free queries', () => {
  test('sends the history window to the AI and records both turns', async ({ assert }) => {
    const { router, repository, ai } = buildBotStack()
    repository.seedUser('U1', 'en', 'rm-en')

    const reply = await router.handle('U1', 'What is the minimum wage?')

    assert.deepEqual(reply, { text: 'Here is some advice.', language: 'en', source: 'ai' })
    assert.deepEqual(
      ai.contexts[0].map((turn) => [turn.role, turn.content]),
      [['user', 'What is the minimum wage?']]
    )
    assert.deepEqual(
      repository.turns.map((turn) => [turn.role, turn.content]),
      [
        ['user', 'What is the minimum wage?'],
        ['assistant', 'Here is some advice.'],
      ]
    )
  })

  test('an unavailable AI yields the localized fallback and no assistant turn', async ({
    assert,
  }) => {
    const { router, repository, ai } = buildBotStack()
    repository.seedUser('U1', 'id', 'rm-id')
    ai.mode = 'error'

    const reply = await router.handle('U1', 'Berapa gaji minimum?')

    assert.deepEqual(reply, {
      text: 'Maaf, saya tidak bisa menjawab sekarang. Silakan coba lagi sebentar lagi.',
      language: 'id',
      source: 'ai_fallback',
    })
    assert.deepEqual(
      repository.turns.map((turn) => turn.role),
      ['user']
    )
  })

  test('the history window stays bounded', async ({ assert }) => {
    const { router, repository, ai } = buildBotStack({ historyWindow: 3 })
    repository.seedUser('U1', 'en', 'rm-en')

    await router.handle('U1', 'first question')
    await router.handle('U1', 'second question')
    await router.handle('U1', 'third question')

    assert.deepEqual(
      ai.contexts[2].map((turn) => turn.content),
      ['second question', 'Here is some advice.', 'third question']
    )
    assert.lengthOf(repository.turns, 6)
  })

  test('a request cancelled during the AI call keeps only the user turn', async ({ assert }) => {
    const { router, repository, ai } = buildBotStack()
    repository.seedUser('U1', 'en', 'rm-en')
    const controller = new AbortController()
    ai.complete = async () => {
      controller.abort()
      return 'Too late.'
    }

    const reply = await router.handle('U1', 'Can my employer keep my passport?', {
      signal: controller.signal,
    })

    assert.deepEqual(reply, {
      text: "Sorry, I can't answer right now. Please try again in a moment.",
      language: 'en',
      source: 'ai_fallback',
    })
    assert.deepEqual(
      repository.turns.map((turn) => [turn.role, turn.content]),
      [['user', 'Can my employer keep my passport?']]
    )
  })

  test('any internal failure becomes a generic localized error', async ({ assert }) => {
    const { router, repository } = buildBotStack()
    repository.getUser = async () => {
      throw new Error('database offline')
    }

    const reply = await router.handle('U1', 'hello')

    assert.deepEqual(reply, {
      text: 'Something went wrong on my side. Please try again.',
      language: 'en',
      source: 'error',
    })
  })
})

test.group('ResponseRouter | same user concurrency', () => {
  test('concurrent /lang commands leave the menu of the final language', async ({ assert }) => {
    const { router, repository, registry } = buildBotStack()
    repository.seedUser('U1', 'en', 'rm-en')

    await Promise.all([router.handle('U1', '/lang vi'), router.handle('U1', '/lang zh')])

    const user = repository.users.get('U1')
    assert.oneOf(user?.preferredLanguage, ['vi', 'zh'])
    assert.equal(
      user?.assignedMenuId,
      user ? registry.get(user.preferredLanguage)?.artifactId : undefined
    )
  })

  test('concurrent queries are logged in arrival order', async ({ assert }) => {
    const { router, repository } = buildBotStack()
    repository.seedUser('U1', 'en', 'rm-en')

    const replies = await Promise.all([
      router.handle('U1', 'first question'),
      router.handle('U1', 'second question'),
    ])

    assert.deepEqual(
      replies.map((reply) => reply.source),
      ['ai', 'ai']
    )
    assert.deepEqual(
      repository.turns.filter((turn) => turn.role === 'user').map((turn) => turn.content),
      ['first question', 'second question']
    )
    assert.lengthOf(
      repository.turns.filter((turn) => turn.role === 'assistant'),
      2
    )
    assert.equal(repository.turns[0].content, 'first question')
  })
})
