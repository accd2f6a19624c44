import { test } from '@japa/runner'
import { messagingApi } from '@line/bot-sdk'
import LineAdapter from '#bot/core/adapters/line_adapter'
import {
  orderingKey,
  toIncomingMessage,
  type LineWebhookEvent,
} from '#bot/core/adapters/line_event_mapper'

const TIMESTAMP = 1_700_000_000_000

test.group('LINE event mapper', () => {
  test('maps a direct text message', ({ assert }) => {
    const event: LineWebhookEvent = {
      type: 'message',
      timestamp: TIMESTAMP,
      replyToken: 'reply-1',
      source: { type: 'user', userId: 'U1' },
      message: { id: 'm1', type: 'text', text: 'hello' },
    }

    const message = toIncomingMessage(event)

    assert.deepEqual(message, {
      channel: 'line',
      scope: 'direct',
      userId: 'U1',
      replyToken: 'reply-1',
      timestamp: new Date(TIMESTAMP),
      content: 'hello',
      messageType: 'text',
    })
    assert.equal(message ? orderingKey(message) : null, 'user:U1')
  })

  test('maps postbacks from groups and rooms', ({ assert }) => {
    const fromGroup = toIncomingMessage({
      type: 'postback',
      timestamp: TIMESTAMP,
      replyToken: 'reply-2',
      source: { type: 'group', groupId: 'G1', userId: 'U2' },
      postback: { data: 'lang_id' },
    })
    const fromRoom = toIncomingMessage({
      type: 'message',
      timestamp: TIMESTAMP,
      replyToken: 'reply-3',
      source: { type: 'room', roomId: 'R1', userId: 'U3' },
      message: { id: 'm3', type: 'text', text: 'hi all' },
    })

    assert.equal(fromGroup?.scope, 'group')
    assert.equal(fromGroup?.groupId, 'G1')
    assert.equal(fromGroup?.messageType, 'postback')
    assert.equal(fromGroup?.content, 'lang_id')
    assert.equal(fromRoom?.groupId, 'R1')
    assert.equal(fromRoom ? orderingKey(fromRoom) : null, 'group:R1')
  })

  test('ignores events it cannot answer', ({ assert }) => {
    assert.isNull(
      toIncomingMessage({
        type: 'message',
        timestamp: TIMESTAMP,
        replyToken: 'reply-4',
        source: { type: 'user', userId: 'U1' },
        message: { id: 'm4', type: 'sticker' },
      })
    )
    assert.isNull(
      toIncomingMessage({
        type: 'follow',
        timestamp: TIMESTAMP,
        replyToken: 'reply-5',
        source: { type: 'user', userId: 'U1' },
      })
    )
    assert.isNull(
      toIncomingMessage({
        type: 'message',
        timestamp: TIMESTAMP,
        source: { type: 'user', userId: 'U1' },
        message: { id: 'm6', type: 'text', text: 'no token' },
      })
    )
  })
})

test.group('LineAdapter', () => {
  test('truncates text and quick replies to the LINE limits', ({ assert }) => {
    const adapter = new LineAdapter({
      channelAccessToken: 'test-token',
      maxMessageLength: 10,
      timeoutMs: 1000,
    })

    const message = adapter.buildMessage({
      text: 'abcdefghijklmnop',
      language: 'en',
      source: 'command',
      quickReplies: Array.from({ length: 15 }, (_, index) => ({
        label: `Option number ${index} with a long label`,
        text: `/lang ${index}`,
      })),
    })

    assert.equal(message.text, 'abcdefghij')
    assert.lengthOf(message.quickReply?.items ?? [], 13)
    assert.deepEqual(message.quickReply?.items?.[0], {
      type: 'action',
      action: { type: 'message', label: 'Option number 0 with', text: '/lang 0' },
    })
  })

  test('never splits an emoji when truncating', ({ assert }) => {
    const adapter = new LineAdapter({ channelAccessToken: 'test-token', maxMessageLength: 3, timeoutMs: 1000 })

    const message = adapter.buildMessage({
      text: 'ab😀😀',
      language: 'en',
      source: 'command',
      quickReplies: [{ label: '🇻🇳'.repeat(11), text: '/lang vi' }],
    })

    assert.equal(message.text, 'ab😀')
    assert.deepEqual(message.quickReply?.items?.[0], {
      type: 'action',
      action: { type: 'message', label: '🇻🇳'.repeat(10), text: '/lang vi' },
    })
  })

  test('omits quick replies when there are none', ({ assert }) => {
    const adapter = new LineAdapter({ channelAccessToken: 'test-token', maxMessageLength: 5000, timeoutMs: 1000 })

    assert.deepEqual(adapter.buildMessage({ text: 'ok', language: 'en', source: 'canned' }), {
      type: 'text',
      text: 'ok',
    })
  })

  test('replies with the webhook reply token', async ({ assert }) => {
    const client = new messagingApi.MessagingApiClient({ channelAccessToken: 'test-token' })
    const requests: messagingApi.ReplyMessageRequest[] = []
    client.replyMessage = async (request: messagingApi.ReplyMessageRequest) => {
      requests.push(request)
      return { sentMessages: [] }
    }
    const adapter = new LineAdapter(
      { channelAccessToken: 'test-token', maxMessageLength: 5000, timeoutMs: 1000 },
      client
    )

    await adapter.reply('reply-1', { text: 'Hello', language: 'en', source: 'canned' })

    assert.deepEqual(requests, [{ replyToken: 'reply-1', messages: [{ type: 'text', text: 'Hello' }] }])
  })
})
