/**
 * Configuration du système IA
 */

export const AI_CONFIG = {
  anthropic: {
    defaultModel: 'claude-sonnet-4-20250514',
  },

  // Réponses de l'assistant
  assistant: {
    maxTokens: 1000,
    temperature: 0.7,
  },

  // Traduction de groupe
  translation: {
    maxTokens: 500,
    temperature: 0.3,
  },

  truncationSuffix: '...',
}
