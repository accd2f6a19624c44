import logger from '@adonisjs/core/services/logger'
import commandsConfig, {
  COMMAND_NAMES,
  type CommandDefinition,
  type CommandName,
} from '#config/commands'
import type { ChatScope } from '#bot/types/bot_types'
import type { ParsedCommand } from '#bot/types/intent_types'

interface CommandEntry {
  name: CommandName
  definition: CommandDefinition
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

export default class CommandManager {
  private static instance: CommandManager
  private readonly commandMap = new Map<string, CommandEntry>()
  private readonly pattern: RegExp

  private constructor() {
    this.pattern = new RegExp(
      `^${escapeRegExp(commandsConfig.prefix)}(\\S+)(?:\\s+([\\s\\S]*))?$`,
      'u'
    )
    this.buildCommandMap()
  }

  public static getInstance(): CommandManager {
    if (!CommandManager.instance) {
      CommandManager.instance = new CommandManager()
    }
    return CommandManager.instance
  }

  /**
   * Construit la map synonyme → commande depuis la configuration
   */
  private buildCommandMap(): void {
    for (const name of COMMAND_NAMES) {
      const definition: CommandDefinition = commandsConfig.commands[name]
      for (const synonym of definition.synonyms) {
        this.commandMap.set(synonym.toLowerCase(), { name, definition })
      }
    }

    logger.debug({ synonyms: this.commandMap.size }, 'Command map built')
  }

  public get prefix(): string {
    return commandsConfig.prefix
  }

  /**
   * Détecte une commande connue en tête du message. Un jeton inconnu,
   * ou une commande réservée à un autre type de conversation, n'est pas
   * une commande.
   */
  public detectCommand(input: string, scope: ChatScope): ParsedCommand<CommandName> | null {
    const match = this.pattern.exec(input.trim())
    if (!match) {
      return null
    }

    const token = match[1].toLowerCase()
    const entry = this.commandMap.get(token)
    if (!entry) {
      return null
    }

    if (entry.definition.scope !== 'any' && entry.definition.scope !== scope) {
      return null
    }

    const rawArgument = match[2]?.trim() ?? ''
    return {
      name: entry.name,
      token,
      argument: entry.definition.takesArgument && rawArgument.length > 0 ? rawArgument : null,
    }
  }

  public getSynonyms(name: CommandName): string[] {
    return [...commandsConfig.commands[name].synonyms]
  }

  public getStats(): { totalSynonyms: number; commandsByScope: Record<string, number> } {
    const commandsByScope: Record<string, number> = {}
    for (const { definition } of this.commandMap.values()) {
      commandsByScope[definition.scope] = (commandsByScope[definition.scope] ?? 0) + 1
    }
    return { totalSynonyms: this.commandMap.size, commandsByScope }
  }
}
