import type { AIProvider, AIRequest, AIUsageStats } from '#bot/types/ai_types'

/**
 * Classe abstraite pour tous les providers IA
 */
export abstract class BaseProvider implements AIProvider {
  public abstract readonly name: string
  private requests = 0
  private failures = 0

  protected abstract send(request: AIRequest, signal: AbortSignal): Promise<string>
  abstract isAvailable(): boolean

  async generate(request: AIRequest, signal: AbortSignal): Promise<string> {
    this.requests++
    try {
      return await this.send(request, signal)
    } catch (error) {
      this.failures++
      throw error
    }
  }

  getUsageStats(): AIUsageStats {
    return {
      provider: this.name,
      isAvailable: this.isAvailable(),
      requests: this.requests,
      failures: this.failures,
    }
  }
}
