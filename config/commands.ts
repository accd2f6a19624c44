import type { ChatScope } from '#bot/types/bot_types'

export const COMMAND_NAMES = ['lang', 'help', 'emergency', 'clear', 'translate'] as const

export type CommandName = (typeof COMMAND_NAMES)[number]

export interface CommandDefinition {
  synonyms: string[]
  scope: ChatScope | 'any'
  takesArgument: boolean
}

export default {
  /**
   * Caractère qui introduit une commande
   */
  prefix: '/',

  commands: {
    lang: {
      synonyms: ['lang', 'language', 'bahasa', 'ngonngu'],
      scope: 'direct',
      takesArgument: true,
    },
    help: {
      synonyms: ['help', 'bantuan', 'trogiup'],
      scope: 'direct',
      takesArgument: false,
    },
    emergency: {
      synonyms: ['emergency', 'sos', 'darurat', 'khancap'],
      scope: 'direct',
      takesArgument: false,
    },
    clear: {
      synonyms: ['clear', 'reset', 'hapus', 'xoa'],
      scope: 'direct',
      takesArgument: false,
    },
    translate: {
      synonyms: ['translate', 'tr'],
      scope: 'group',
      takesArgument: true,
    },
  } satisfies Record<CommandName, CommandDefinition>,
}
