import { DateTime } from 'luxon'
import type { BotRepository } from '#bot/contracts/persistence.contract'
import type {
  DetectionResult,
  LanguageDetector,
  RichMenuPlatform,
} from '#bot/contracts/platform.contract'
import type { AIBackend, AIUsageStats } from '#bot/types/ai_types'
import type {
  BotUserRecord,
  ChannelAdapter,
  ConversationTurn,
  GroupChannelRecord,
  MessageChannel,
  Reply,
  SupportedLanguage,
} from '#bot/types/bot_types'
import type { RichMenuBlueprint, RichMenuSummary } from '#bot/types/rich_menu_types'
import { UpstreamErrorException } from '#exceptions/bot_exceptions'

/**
 * Dépôt en mémoire, mêmes garanties d'ordre que la base
 */
export class InMemoryBotRepository implements BotRepository {
  readonly users = new Map<string, BotUserRecord>()
  readonly turns: ConversationTurn[] = []
  readonly groups = new Map<string, GroupChannelRecord>()

  async getUser(id: string): Promise<BotUserRecord | null> {
    const user = this.users.get(id)
    return user ? { ...user } : null
  }

  async upsertUser(user: BotUserRecord): Promise<void> {
    this.users.set(user.id, { ...user })
  }

  async listUsers(afterId: string | null, limit: number): Promise<BotUserRecord[]> {
    return [...this.users.values()]
      .filter((user) => afterId === null || user.id > afterId)
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, limit)
      .map((user) => ({ ...user }))
  }

  async appendTurn(turn: ConversationTurn): Promise<void> {
    this.turns.push({ ...turn })
  }

  async getRecentTurns(userId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) return []
    return this.turns.filter((turn) => turn.userId === userId).slice(-limit)
  }

  async truncateTurns(userId: string): Promise<void> {
    const kept = this.turns.filter((turn) => turn.userId !== userId)
    this.turns.splice(0, this.turns.length, ...kept)
  }

  async getGroupChannel(groupId: string): Promise<GroupChannelRecord | null> {
    const channel = this.groups.get(groupId)
    return channel ? { ...channel } : null
  }

  async upsertGroupChannel(channel: GroupChannelRecord): Promise<void> {
    this.groups.set(channel.groupId, { ...channel })
  }

  seedUser(id: string, preferredLanguage: SupportedLanguage, assignedMenuId: string | null) {
    this.users.set(id, { id, preferredLanguage, assignedMenuId, lastSeenAt: DateTime.now() })
  }
}

/**
 * Plateforme de menus qui journalise chaque appel sous la forme
 * `<méthode> <arguments>`
 */
export class RecordingRichMenuPlatform implements RichMenuPlatform {
  readonly supportsAtomicReassign: boolean
  readonly calls: string[] = []
  readonly menus: RichMenuSummary[]
  readonly blueprints: RichMenuBlueprint[] = []
  failing = false
  failOnCreate: SupportedLanguage[] = []
  private sequence = 0

  constructor(options: { supportsAtomicReassign?: boolean; menus?: RichMenuSummary[] } = {}) {
    this.supportsAtomicReassign = options.supportsAtomicReassign ?? true
    this.menus = [...(options.menus ?? [])]
  }

  async createArtifact(blueprint: RichMenuBlueprint): Promise<string> {
    this.record(`create ${blueprint.name}`)
    if (this.failOnCreate.includes(blueprint.language)) {
      throw new Error(`cannot create ${blueprint.name}`)
    }
    const artifactId = `rm-new-${++this.sequence}`
    this.blueprints.push(blueprint)
    this.menus.push({ artifactId, name: blueprint.name })
    return artifactId
  }

  async uploadImage(artifactId: string): Promise<void> {
    this.record(`upload ${artifactId}`)
  }

  async linkArtifact(userId: string, artifactId: string): Promise<void> {
    this.record(`link ${userId} ${artifactId}`)
  }

  async unlinkArtifact(userId: string): Promise<void> {
    this.record(`unlink ${userId}`)
  }

  async listArtifacts(): Promise<RichMenuSummary[]> {
    this.calls.push('list')
    return [...this.menus]
  }

  async deleteArtifact(artifactId: string): Promise<void> {
    this.record(`delete ${artifactId}`)
    const index = this.menus.findIndex((menu) => menu.artifactId === artifactId)
    if (index >= 0) this.menus.splice(index, 1)
  }

  private record(call: string): void {
    this.calls.push(call)
    if (this.failing) {
      throw new Error('platform unavailable')
    }
  }
}

/**
 * Backend IA scripté : réponse fixe ou échec systématique
 */
export class ScriptedAIBackend implements AIBackend {
  mode: 'ok' | 'error' = 'ok'
  answer = 'Here is some advice.'
  readonly contexts: ConversationTurn[][] = []
  readonly translations: Array<{ text: string; target: SupportedLanguage }> = []

  async complete(context: ConversationTurn[], _language: SupportedLanguage): Promise<string> {
    this.contexts.push(context.map((turn) => ({ ...turn })))
    if (this.mode === 'error') {
      throw new UpstreamErrorException('ai_backend', 'scripted failure')
    }
    return this.answer
  }

  async translate(text: string, target: SupportedLanguage): Promise<string> {
    this.translations.push({ text, target })
    if (this.mode === 'error') {
      throw new UpstreamErrorException('ai_backend', 'scripted failure')
    }
    return `[${target}] ${text}`
  }

  getStats(): AIUsageStats {
    return {
      provider: 'scripted',
      isAvailable: this.mode === 'ok',
      requests: this.contexts.length + this.translations.length,
      failures: 0,
    }
  }
}

export class FixedLanguageDetector implements LanguageDetector {
  readonly name = 'fixed'
  readonly inputs: string[] = []

  constructor(public result: DetectionResult | Error) {}

  async detect(text: string): Promise<DetectionResult> {
    this.inputs.push(text)
    if (this.result instanceof Error) {
      throw this.result
    }
    return this.result
  }
}

export class RecordingChannelAdapter implements ChannelAdapter {
  readonly channel: MessageChannel = 'line'
  readonly sent: Array<{ replyToken: string; reply: Reply }> = []
  failing = false

  async reply(replyToken: string, reply: Reply): Promise<void> {
    if (this.failing) {
      throw new Error('channel unavailable')
    }
    this.sent.push({ replyToken, reply })
  }
}
